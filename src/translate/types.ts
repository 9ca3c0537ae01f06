import type {
  DomainValue,
  RawCallValue,
  RawValueType,
} from "../devices/types.ts";
import type { DatapointRef } from "../topics.ts";

/**
 * Parameter change as reported by the controller, e.g.
 * { address: "A1", channel: 1, parameter: "ALARM", value: 1 }
 */
export interface RawEvent {
  address: string;
  channel: number;
  parameter: string;
  value: unknown;
  timestamp: number;
}

export interface DomainEvent extends DatapointRef {
  value: DomainValue;
  timestamp: number;
  /** synthetic one-shot event derived from a state change or a key press */
  trigger: boolean;
}

export interface Publication {
  topic: string;
  payload: string;
  retain: boolean;
}

export interface Translation {
  events: DomainEvent[];
  publications: Publication[];
}

export interface InboundMessage {
  id: string;
  topic: string;
  payload: string;
}

export interface ControllerCall {
  address: string;
  channel: number;
  parameter: string;
  value: RawCallValue;
  type: RawValueType;
}

export interface Command extends DatapointRef {
  messageId: string;
  value: DomainValue;
  call: ControllerCall;
}
