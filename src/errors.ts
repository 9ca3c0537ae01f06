import type { LogExtra } from "./logger.ts";

export type BridgeErrorKind =
  | "UnknownChannel"
  | "DomainViolation"
  | "UnresolvedTopic"
  | "ControllerCallFailure"
  | "TransportLoss"
  | "StartupFailure";

/**
 * Base class for every error the bridge reports on purpose. `details` ends up
 * in the log entry next to the message.
 */
export abstract class BridgeError extends Error {
  abstract readonly kind: BridgeErrorKind;
  readonly details: LogExtra;

  constructor(message: string, details: LogExtra = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Event or command for an address/channel the registry does not know */
export class UnknownChannelError extends BridgeError {
  readonly kind = "UnknownChannel";

  constructor(address: string, channel: number) {
    super(`Unknown channel ${address}:${channel}`, { address, channel });
  }
}

/** Value outside the range or enumeration declared for a datapoint */
export class DomainViolationError extends BridgeError {
  readonly kind = "DomainViolation";
}

/** Command topic without a writable datapoint behind it */
export class UnresolvedTopicError extends BridgeError {
  readonly kind = "UnresolvedTopic";

  constructor(topic: string) {
    super(`No datapoint accepts commands on ${topic}`, { topic });
  }
}

export class ControllerCallError extends BridgeError {
  readonly kind = "ControllerCallFailure";
}

export class TransportLossError extends BridgeError {
  readonly kind = "TransportLoss";
}

/** The only kind that stops the process */
export class StartupError extends BridgeError {
  readonly kind = "StartupFailure";
}

export const isBridgeError = (error: unknown): error is BridgeError =>
  error instanceof BridgeError;
