/**
 * MQTT command messages → controller setValue calls. No I/O happens here.
 */

import type { DeviceRegistry } from "../device.ts";
import { decodePayload, encodeRaw } from "../devices/domain.ts";
import { hasCapability, type DatapointSpec } from "../devices/types.ts";
import { UnresolvedTopicError } from "../errors.ts";
import type { DatapointRef, TopicScheme } from "../topics.ts";
import { Result } from "../utility.ts";
import type { Command, ControllerCall, InboundMessage } from "./types.ts";

const toCall = (
  ref: DatapointRef,
  spec: DatapointSpec,
  value: Command["value"]
): ControllerCall => {
  const write = spec.writes?.[String(value)] ?? {
    parameter: spec.parameter,
    ...encodeRaw(spec.domain, value),
  };
  return { address: ref.address, channel: ref.channel, ...write };
};

export class CommandTranslator {
  private readonly registry: DeviceRegistry;
  private readonly topics: TopicScheme;

  constructor(registry: DeviceRegistry, topics: TopicScheme) {
    this.registry = registry;
    this.topics = topics;
  }

  translate = (message: InboundMessage): Result<Command> => {
    const ref = this.registry.reverseLookup(message.topic);
    const spec = ref && this.registry.datapoint(ref);

    // The index also holds state topics; only a writable datapoint's command
    // topic accepts commands
    if (
      !ref ||
      !spec ||
      !hasCapability(spec, "write") ||
      this.topics.command(ref) !== message.topic
    ) {
      return Result.throw(new UnresolvedTopicError(message.topic));
    }

    return decodePayload(spec.domain, message.payload).map(value => ({
      ...ref,
      messageId: message.id,
      value,
      call: toCall(ref, spec, value),
    }));
  };
}
