/**
 * Home Assistant MQTT discovery payloads
 *
 * Generation is a pure function of the registry: the same registry always
 * yields the same topics and byte-identical payloads, so republishing after a
 * reconnect never creates duplicate or drifting entities.
 */

import { match } from "ts-pattern";
import type { Channel, DeviceRegistry, RegisteredDevice } from "./device.ts";
import { encodePayload, PAYLOAD_OFF, PAYLOAD_ON } from "./devices/domain.ts";
import {
  hasCapability,
  type DatapointSpec,
  type DiscoveryShape,
} from "./devices/types.ts";
import type { StateCache } from "./state.ts";
import { topicSegment, type DatapointRef, type TopicScheme } from "./topics.ts";
import {
  attributesPayload,
  AVAILABLE,
  UNAVAILABLE,
} from "./translate/events.ts";
import type { Publication } from "./translate/types.ts";

export interface DiscoveryOrigin {
  name: string;
  sw_version?: string;
}

type Payload = Record<string, unknown>;

const ref = (channel: Channel, spec: DatapointSpec): DatapointRef => ({
  address: channel.address,
  channel: channel.index,
  datapoint: spec.name,
});

const uniqueId = ({ address, channel, datapoint }: DatapointRef) =>
  `hm_${topicSegment(address)}_${channel}_${datapoint}`;

const config = (topic: string, payload: Payload): Publication => ({
  topic,
  payload: JSON.stringify(payload),
  retain: true,
});

export class DiscoveryPublisher {
  private readonly topics: TopicScheme;
  private readonly origin: DiscoveryOrigin;

  constructor(topics: TopicScheme, origin: DiscoveryOrigin) {
    this.topics = topics;
    this.origin = origin;
  }

  /**
   * One config per exposed datapoint and one device trigger per
   * trigger-capable datapoint, for every registered channel
   */
  publishAll = (registry: DeviceRegistry): Publication[] =>
    registry.devices().flatMap(this.configsFor);

  configsFor = (device: RegisteredDevice): Publication[] =>
    device.channels.flatMap(channel =>
      channel.role.datapoints.flatMap(spec => [
        ...(spec.discovery
          ? [this.entityConfig(device, channel, spec, spec.discovery)]
          : []),
        ...(spec.trigger ? [this.triggerConfig(device, channel, spec)] : []),
      ])
    );

  /**
   * Cached state, channel attributes and availability to re-publish after the
   * configs. Devices that never reported UNREACH are announced as available.
   */
  retainedState = (
    registry: DeviceRegistry,
    cache: StateCache
  ): Publication[] =>
    registry.devices().flatMap(device => {
      let available = true;
      const states = device.channels.flatMap(channel => {
        const publications: Publication[] = channel.role.datapoints
          .filter(spec => hasCapability(spec, "read"))
          .flatMap(spec => {
            const datapoint = ref(channel, spec);
            const entry = cache.get(datapoint);
            if (!entry) {
              return [];
            }
            if (spec.availability) {
              available = entry.value !== true;
            }
            return [
              {
                topic: this.topics.state(datapoint),
                payload: encodePayload(entry.value),
                retain: true,
              },
            ];
          });

        const reported = cache.reported(channel.address, channel.index);
        if (reported) {
          publications.push({
            topic: this.topics.attributes(channel.address, channel.index),
            payload: attributesPayload(channel, reported),
            retain: true,
          });
        }
        return publications;
      });

      return [
        ...states,
        {
          topic: this.topics.availability(device.address),
          payload: available ? AVAILABLE : UNAVAILABLE,
          retain: true,
        },
      ];
    });

  /** Empty retained configs make the consumer delete the entities */
  removals = (device: RegisteredDevice): Publication[] =>
    this.configsFor(device).map(({ topic }) => ({
      topic,
      payload: "",
      retain: true,
    }));

  private deviceGroup = (device: RegisteredDevice): Payload => ({
    identifiers: [`hm_${topicSegment(device.address)}`],
    name: `${device.descriptor.model} ${device.address}`,
    manufacturer: device.descriptor.manufacturer,
    model: device.descriptor.model,
    ...(device.firmware ? { sw_version: device.firmware } : {}),
  });

  private entityConfig = (
    device: RegisteredDevice,
    channel: Channel,
    spec: DatapointSpec,
    shape: DiscoveryShape
  ): Publication => {
    const datapoint = ref(channel, spec);
    const common: Payload = {
      name: `${spec.title} ${channel.index}`,
      unique_id: uniqueId(datapoint),
      object_id: uniqueId(datapoint),
      availability_topic: this.topics.availability(device.address),
      payload_available: AVAILABLE,
      payload_not_available: UNAVAILABLE,
      json_attributes_topic: this.topics.attributes(
        device.address,
        channel.index
      ),
    };

    const specific: Payload = match(shape)
      .with({ component: "sensor" }, s => ({
        state_topic: this.topics.state(datapoint),
        ...(s.deviceClass ? { device_class: s.deviceClass } : {}),
        ...(s.stateClass ? { state_class: s.stateClass } : {}),
        ...(spec.domain.kind === "numeric" && spec.domain.unit
          ? { unit_of_measurement: spec.domain.unit }
          : {}),
        ...(spec.domain.kind === "enum"
          ? { options: [...spec.domain.labels] }
          : {}),
      }))
      .with({ component: "binary_sensor" }, s => ({
        state_topic: this.topics.state(datapoint),
        payload_on: PAYLOAD_ON,
        payload_off: PAYLOAD_OFF,
        ...(s.deviceClass ? { device_class: s.deviceClass } : {}),
      }))
      .with({ component: "switch" }, () => ({
        state_topic: this.topics.state(datapoint),
        command_topic: this.topics.command(datapoint),
        payload_on: PAYLOAD_ON,
        payload_off: PAYLOAD_OFF,
      }))
      .with({ component: "cover" }, s => ({
        device_class: s.deviceClass,
        command_topic: this.topics.command({
          ...datapoint,
          datapoint: s.movement,
        }),
        payload_open: "up",
        payload_close: "down",
        payload_stop: "stop",
        position_topic: this.topics.state({
          ...datapoint,
          channel: s.positionChannel ?? channel.index,
        }),
        set_position_topic: this.topics.command(datapoint),
        position_open: 100,
        position_closed: 0,
      }))
      .exhaustive();

    return config(this.topics.discovery(shape.component, datapoint), {
      ...common,
      ...specific,
      device: this.deviceGroup(device),
      origin: this.origin,
    });
  };

  private triggerConfig = (
    device: RegisteredDevice,
    channel: Channel,
    spec: DatapointSpec
  ): Publication => {
    const datapoint = ref(channel, spec);
    return config(this.topics.discovery("device_automation", datapoint), {
      automation_type: "trigger",
      topic: this.topics.trigger(datapoint),
      type: spec.trigger?.type,
      subtype: `${spec.name}_${channel.index}`,
      device: this.deviceGroup(device),
      origin: this.origin,
    });
  };
}
