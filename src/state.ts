import type { DomainValue } from "./devices/types.ts";
import type { DatapointRef } from "./topics.ts";
import type { DomainEvent } from "./translate/types.ts";

export interface StateEntry {
  value: DomainValue;
  timestamp: number;
}

export interface StateRecord extends DatapointRef, StateEntry {}

/** Raw parameter value as last reported by the controller */
export type AttributeValue = boolean | number | string;

export const isAttributeValue = (value: unknown): value is AttributeValue =>
  typeof value === "boolean" ||
  typeof value === "number" ||
  typeof value === "string";

export interface StateUpdate {
  entry: StateEntry;
  previous?: StateEntry;
  /** no previous entry, or the value differs from it */
  transitioned: boolean;
}

const channelKey = (address: string, channel: number) =>
  `${address}:${channel}`;

const compare = (a: string | number, b: string | number) =>
  a < b ? -1 : a > b ? 1 : 0;

/**
 * Last observed value per (address, channel, datapoint), partitioned by
 * channel, next to every raw parameter reported for the channel. The event
 * translator is the only writer.
 */
export class StateCache {
  private channels = new Map<string, Map<string, StateEntry>>();
  private attributes = new Map<string, Map<string, AttributeValue>>();

  apply = ({
    address,
    channel,
    datapoint,
    value,
    timestamp,
  }: DomainEvent): StateUpdate => {
    const key = channelKey(address, channel);
    let entries = this.channels.get(key);
    if (!entries) {
      entries = new Map();
      this.channels.set(key, entries);
    }

    const previous = entries.get(datapoint);
    const entry: StateEntry = { value, timestamp };
    entries.set(datapoint, entry);

    return {
      entry,
      ...(previous ? { previous } : {}),
      transitioned: previous === undefined || previous.value !== value,
    };
  };

  get = ({
    address,
    channel,
    datapoint,
  }: DatapointRef): StateEntry | undefined =>
    this.channels.get(channelKey(address, channel))?.get(datapoint);

  /** Records a raw parameter; true when it differs from the last report */
  note = (
    address: string,
    channel: number,
    parameter: string,
    value: AttributeValue
  ): boolean => {
    const key = channelKey(address, channel);
    let reported = this.attributes.get(key);
    if (!reported) {
      reported = new Map();
      this.attributes.set(key, reported);
    }

    const changed = reported.get(parameter) !== value;
    reported.set(parameter, value);
    return changed;
  };

  /** Raw parameters of a channel in the order they were first reported */
  reported = (
    address: string,
    channel: number
  ): ReadonlyMap<string, AttributeValue> | undefined =>
    this.attributes.get(channelKey(address, channel));

  /** Every entry, ordered by address, channel and datapoint */
  snapshot = (): StateRecord[] =>
    [...this.channels.entries()]
      .flatMap(([key, entries]) => {
        const separator = key.lastIndexOf(":");
        const address = key.slice(0, separator);
        const channel = Number(key.slice(separator + 1));
        return [...entries].map(([datapoint, entry]) => ({
          address,
          channel,
          datapoint,
          ...entry,
        }));
      })
      .sort(
        (a, b) =>
          compare(a.address, b.address) ||
          compare(a.channel, b.channel) ||
          compare(a.datapoint, b.datapoint)
      );

  /** Drops everything known about a device */
  forget = (address: string): void => {
    for (const partition of [this.channels, this.attributes]) {
      for (const key of [...partition.keys()]) {
        if (key.slice(0, key.lastIndexOf(":")) === address) {
          partition.delete(key);
        }
      }
    }
  };

  get size(): number {
    let count = 0;
    this.channels.forEach(entries => (count += entries.size));
    return count;
  }
}
