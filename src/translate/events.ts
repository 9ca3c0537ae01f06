/**
 * Controller events → domain events and MQTT publications
 */

import type { Channel, DeviceRegistry } from "../device.ts";
import { decodeRaw, encodePayload } from "../devices/domain.ts";
import { hasCapability, type DatapointSpec } from "../devices/types.ts";
import { UnknownChannelError } from "../errors.ts";
import { createLogger } from "../logger.ts";
import {
  isAttributeValue,
  type AttributeValue,
  type StateCache,
  type StateUpdate,
} from "../state.ts";
import type { TopicScheme } from "../topics.ts";
import { Result } from "../utility.ts";
import type {
  DomainEvent,
  Publication,
  RawEvent,
  Translation,
} from "./types.ts";

const log = createLogger("events");

export const AVAILABLE = "online";
export const UNAVAILABLE = "offline";

const empty = (): Translation => ({ events: [], publications: [] });

/**
 * JSON document for the attributes topic: the channel description followed
 * by every raw parameter reported for it, keys in lower case
 */
export const attributesPayload = (
  channel: Channel,
  reported: ReadonlyMap<string, AttributeValue>
): string =>
  JSON.stringify({
    address: `${channel.address}:${channel.index}`,
    index: channel.index,
    parent: channel.address,
    parent_type: channel.descriptor.model,
    type: channel.role.type,
    ...Object.fromEntries(
      [...reported].map(([parameter, value]) => [
        parameter.toLowerCase(),
        value,
      ])
    ),
  });

const isFlagSet = (value: AttributeValue | undefined): boolean =>
  value === true || (typeof value === "number" && value !== 0);

/**
 * A transition trigger needs a known value on both sides of the change; the
 * declared resting value stands in for a value that was never observed.
 */
const isEdge = (spec: DatapointSpec, update: StateUpdate): boolean => {
  const before = update.previous?.value ?? spec.resting;
  return (
    update.transitioned && before !== undefined && before !== update.entry.value
  );
};

export class EventTranslator {
  private readonly registry: DeviceRegistry;
  private readonly cache: StateCache;
  private readonly topics: TopicScheme;

  constructor(registry: DeviceRegistry, cache: StateCache, topics: TopicScheme) {
    this.registry = registry;
    this.cache = cache;
    this.topics = topics;
  }

  translate = (raw: RawEvent): Result<Translation> => {
    const device = this.registry.device(raw.address);
    const channel = device?.channels.find(c => c.index === raw.channel);
    if (!channel) {
      if (device && raw.channel >= 0 && raw.channel < device.channelCount) {
        log.debug("event.unmodeled_channel", {
          address: raw.address,
          channel: raw.channel,
          parameter: raw.parameter,
        });
        return Result.of(empty());
      }
      return Result.throw(new UnknownChannelError(raw.address, raw.channel));
    }

    const spec = channel.role.datapoints.find(
      dp => dp.parameter === raw.parameter && hasCapability(dp, "event")
    );

    let translation: Result<Translation> = Result.of(empty());
    if (spec) {
      translation = decodeRaw(spec.domain, raw.value).map(value =>
        this.toTranslation(spec, {
          address: raw.address,
          channel: raw.channel,
          datapoint: spec.name,
          value,
          timestamp: raw.timestamp,
          trigger: false,
        })
      );
    } else {
      log.debug("event.unmapped_parameter", {
        address: raw.address,
        channel: raw.channel,
        parameter: raw.parameter,
      });
    }

    return translation.map(accepted =>
      merge(accepted, this.report(channel, raw))
    );
  };

  /** Device removal is the only write besides `translate` */
  forget = (address: string): void => this.cache.forget(address);

  /**
   * Records the raw parameter in the channel attributes and recomputes the
   * summaries built from it
   */
  private report = (channel: Channel, raw: RawEvent): Translation => {
    const changed =
      isAttributeValue(raw.value) &&
      this.cache.note(raw.address, raw.channel, raw.parameter, raw.value);
    const reported = this.cache.reported(raw.address, raw.channel);

    const publications: Publication[] = [];
    if (changed && reported) {
      publications.push({
        topic: this.topics.attributes(raw.address, raw.channel),
        payload: attributesPayload(channel, reported),
        retain: true,
      });
    }

    const summaries = channel.role.datapoints
      .filter(dp => dp.summarizes?.includes(raw.parameter))
      .map(summary =>
        this.toTranslation(summary, {
          address: raw.address,
          channel: raw.channel,
          datapoint: summary.name,
          value: (summary.summarizes ?? []).some(flag =>
            isFlagSet(reported?.get(flag))
          ),
          timestamp: raw.timestamp,
          trigger: false,
        })
      );

    return summaries.reduce(merge, { events: [], publications });
  };

  private toTranslation = (
    spec: DatapointSpec,
    event: DomainEvent
  ): Translation => {
    const events: DomainEvent[] = [];
    const publications: Publication[] = [];
    const payload = encodePayload(event.value);

    let fire = spec.trigger?.mode === "occurrence";

    if (hasCapability(spec, "read")) {
      const update = this.cache.apply(event);
      events.push(event);
      publications.push({
        topic: this.topics.state(event),
        payload,
        retain: true,
      });

      if (spec.availability) {
        publications.push({
          topic: this.topics.availability(event.address),
          payload: event.value === true ? UNAVAILABLE : AVAILABLE,
          retain: true,
        });
      }

      fire ||= spec.trigger?.mode === "transition" && isEdge(spec, update);
    }

    if (fire) {
      events.push({ ...event, trigger: true });
      publications.push({
        topic: this.topics.trigger(event),
        payload,
        retain: false,
      });
    }

    return { events, publications };
  };
}

const merge = (a: Translation, b: Translation): Translation => ({
  events: [...a.events, ...b.events],
  publications: [...a.publications, ...b.publications],
});
