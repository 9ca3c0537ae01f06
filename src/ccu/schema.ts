import { z } from "zod";
import type { InventoryEntry } from "../device.ts";

/**
 * Device description as sent with newDevices. Parent devices have no PARENT
 * (or an empty one); each channel is a separate description.
 */
export const DeviceDescriptionSchema = z
  .object({
    ADDRESS: z.string().min(1),
    TYPE: z.string(),
    PARENT: z.string().optional(),
    PARENT_TYPE: z.string().optional(),
    INDEX: z.number().int().optional(),
    CHILDREN: z.array(z.string()).optional(),
    FIRMWARE: z.string().optional(),
  })
  .loose();

export type DeviceDescription = z.infer<typeof DeviceDescriptionSchema>;

export const NewDevicesParamsSchema = z.tuple([
  z.string(),
  z.array(DeviceDescriptionSchema),
]);

export const DeleteDevicesParamsSchema = z.tuple([
  z.string(),
  z.array(z.string()),
]);

/** interface id, "<address>:<channel>" or "CENTRAL", parameter, value */
export const EventParamsSchema = z.tuple([
  z.string(),
  z.string(),
  z.string(),
  z.unknown(),
]);

export const MulticallParamsSchema = z.tuple([
  z.array(
    z.object({
      methodName: z.string(),
      params: z.array(z.unknown()).default([]),
    })
  ),
]);

const isParent = (description: DeviceDescription) => !description.PARENT;

/**
 * Collapses channel descriptions into one entry per parent device. The
 * channel count is taken from CHILDREN, or from the highest reported channel
 * index when CHILDREN is missing.
 */
export const toInventory = (
  descriptions: readonly DeviceDescription[]
): InventoryEntry[] =>
  descriptions.filter(isParent).map(parent => {
    const highestIndex = descriptions
      .filter(d => d.PARENT === parent.ADDRESS && d.INDEX !== undefined)
      .reduce((max, d) => Math.max(max, (d.INDEX ?? 0) + 1), 0);

    return {
      address: parent.ADDRESS,
      model: parent.TYPE,
      channels: Math.max(parent.CHILDREN?.length ?? 0, highestIndex, 1),
      ...(parent.FIRMWARE ? { firmware: parent.FIRMWARE } : {}),
    };
  });

/**
 * Splits "ADDRESS:3" into its parts; undefined for device-less addresses
 * like "CENTRAL"
 */
export const parseChannelAddress = (
  address: string
): { address: string; channel: number } | undefined => {
  const parts = /^(.+):(\d+)$/.exec(address);
  return parts?.[1] && parts[2]
    ? { address: parts[1], channel: Number.parseInt(parts[2], 10) }
    : undefined;
};
