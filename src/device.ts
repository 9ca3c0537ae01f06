import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEVICE_TYPES, findDeviceType } from "./devices/descriptors.ts";
import {
  hasCapability,
  type ChannelRole,
  type DatapointSpec,
  type DeviceTypeDescriptor,
} from "./devices/types.ts";
import { createLogger } from "./logger.ts";
import { topicSegment, type DatapointRef, type TopicScheme } from "./topics.ts";
import { Result, safeParse } from "./utility.ts";

const log = createLogger("registry");

export const InventoryEntrySchema = z.object({
  address: z.string().min(1, "Field 'address' cannot be empty"),
  model: z.string().min(1, "Field 'model' cannot be empty"),
  channels: z.number().int().positive(),
  firmware: z.string().optional(),
});

export const InventorySchema = z.array(InventoryEntrySchema);

/**
 * One physical device as reported by the controller inventory
 */
export type InventoryEntry = z.infer<typeof InventoryEntrySchema>;

/**
 * Reads an inventory file as written by `hm-mqtt-bridge inventory`
 */
export const loadInventory = (path: string): Result<InventoryEntry[]> =>
  Result.try(() => readFileSync(path, "utf8"))
    .flatMap(text => Result.try((): unknown => JSON.parse(text)))
    .flatMap(content => safeParse(content, InventorySchema));

export interface Channel {
  readonly address: string;
  readonly index: number;
  readonly role: ChannelRole;
  readonly descriptor: DeviceTypeDescriptor;
}

export interface RegisteredDevice {
  readonly address: string;
  readonly descriptor: DeviceTypeDescriptor;
  readonly firmware?: string;
  /** number of channels the controller reports, modeled or not */
  readonly channelCount: number;
  /** modeled channels, sorted by index */
  readonly channels: readonly Channel[];
}

export interface TopicConflict {
  address: string;
  /** address of the device that already owns the topics */
  owner: string;
  segment: string;
}

export interface RegistrationReport {
  registered: string[];
  unchanged: string[];
  unsupported: InventoryEntry[];
  conflicts: TopicConflict[];
}

const buildDevice = (
  entry: InventoryEntry,
  descriptor: DeviceTypeDescriptor
): RegisteredDevice => {
  const channels: Channel[] = [];
  for (let index = 0; index < entry.channels; index++) {
    const role = descriptor.channels[index];
    if (role) {
      channels.push({ address: entry.address, index, role, descriptor });
    }
  }

  return {
    address: entry.address,
    descriptor,
    firmware: entry.firmware,
    channelCount: entry.channels,
    channels,
  };
};

const sameDevice = (a: RegisteredDevice, b: RegisteredDevice): boolean =>
  a.descriptor === b.descriptor &&
  a.firmware === b.firmware &&
  a.channelCount === b.channelCount;

/**
 * Known physical devices and their channels, plus the topic → datapoint index
 * used to route commands. Membership only changes through `register` and
 * `remove`; the index is rebuilt on every change.
 */
export class DeviceRegistry {
  private readonly types: readonly DeviceTypeDescriptor[];
  private readonly topics: TopicScheme;
  private devicesByAddress = new Map<string, RegisteredDevice>();
  private unsupportedByAddress = new Map<string, InventoryEntry>();
  private topicIndex = new Map<string, DatapointRef>();

  constructor(
    topics: TopicScheme,
    types: readonly DeviceTypeDescriptor[] = DEVICE_TYPES
  ) {
    this.topics = topics;
    this.types = types;
  }

  /**
   * Adds or replaces devices. Models without a descriptor are recorded as
   * unsupported; a device whose topics would collide with another device's is
   * rejected and the existing mapping kept.
   */
  register = (inventory: readonly InventoryEntry[]): RegistrationReport => {
    const report: RegistrationReport = {
      registered: [],
      unchanged: [],
      unsupported: [],
      conflicts: [],
    };

    for (const entry of inventory) {
      const descriptor = findDeviceType(entry.model, this.types);

      if (!descriptor) {
        log.warn("registry.unsupported_model", {
          address: entry.address,
          model: entry.model,
        });
        this.unsupportedByAddress.set(entry.address, entry);
        report.unsupported.push(entry);
        continue;
      }

      const conflict = this.findConflict(entry.address);
      if (conflict) {
        log.error("registry.topic_conflict", undefined, { ...conflict });
        report.conflicts.push(conflict);
        continue;
      }

      const device = buildDevice(entry, descriptor);
      const existing = this.devicesByAddress.get(entry.address);
      if (existing && sameDevice(existing, device)) {
        report.unchanged.push(entry.address);
        continue;
      }

      this.unsupportedByAddress.delete(entry.address);
      this.devicesByAddress.set(entry.address, device);
      report.registered.push(entry.address);
      log.debug("registry.registered", {
        address: entry.address,
        model: entry.model,
        channels: device.channels.map(c => c.index),
      });
    }

    if (report.registered.length > 0) {
      this.rebuildIndex();
    }
    return report;
  };

  remove = (addresses: readonly string[]): RegisteredDevice[] => {
    const removed = addresses.flatMap(address => {
      const device = this.devicesByAddress.get(address);
      this.devicesByAddress.delete(address);
      this.unsupportedByAddress.delete(address);
      return device ? [device] : [];
    });

    if (removed.length > 0) {
      this.rebuildIndex();
    }
    return removed;
  };

  lookup = (address: string, channel: number): Channel | undefined =>
    this.devicesByAddress
      .get(address)
      ?.channels.find(candidate => candidate.index === channel);

  datapoint = (ref: DatapointRef): DatapointSpec | undefined =>
    this.lookup(ref.address, ref.channel)?.role.datapoints.find(
      dp => dp.name === ref.datapoint
    );

  reverseLookup = (topic: string): DatapointRef | undefined =>
    this.topicIndex.get(topic);

  device = (address: string): RegisteredDevice | undefined =>
    this.devicesByAddress.get(address);

  devices = (): RegisteredDevice[] =>
    [...this.devicesByAddress.values()].sort((a, b) =>
      a.address < b.address ? -1 : a.address > b.address ? 1 : 0
    );

  channels = (): Channel[] => this.devices().flatMap(d => d.channels);

  unsupported = (): InventoryEntry[] => [...this.unsupportedByAddress.values()];

  isUnsupported = (address: string): boolean =>
    this.unsupportedByAddress.has(address);

  get size(): number {
    return this.devicesByAddress.size;
  }

  private findConflict = (address: string): TopicConflict | undefined => {
    const segment = topicSegment(address);
    const owner = [...this.devicesByAddress.keys()].find(
      other => other !== address && topicSegment(other) === segment
    );
    return owner ? { address, owner, segment } : undefined;
  };

  private rebuildIndex = (): void => {
    const index = new Map<string, DatapointRef>();
    for (const channel of this.channels()) {
      for (const spec of channel.role.datapoints) {
        const ref: DatapointRef = {
          address: channel.address,
          channel: channel.index,
          datapoint: spec.name,
        };
        if (hasCapability(spec, "read") || hasCapability(spec, "event")) {
          index.set(this.topics.state(ref), ref);
        }
        if (hasCapability(spec, "write")) {
          index.set(this.topics.command(ref), ref);
        }
      }
    }
    this.topicIndex = index;
  };
}
