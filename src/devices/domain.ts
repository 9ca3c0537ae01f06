/**
 * Conversions between controller values, normalized domain values and MQTT
 * payloads. Values outside a domain are rejected, never clamped.
 */

import { match } from "ts-pattern";
import { DomainViolationError } from "../errors.ts";
import { Result } from "../utility.ts";
import type {
  DomainValue,
  EnumDomain,
  NumericDomain,
  RawCallValue,
  RawValueType,
  ValueDomain,
} from "./types.ts";

export const PAYLOAD_ON = "ON";
export const PAYLOAD_OFF = "OFF";

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

const violation = (message: string, value: unknown): Result<never> =>
  Result.throw(new DomainViolationError(message, { value }));

const round = (value: number, precision: number): number => {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
};

const inRange = (domain: NumericDomain, value: number): boolean =>
  value >= domain.min && value <= domain.max;

const decodeRawBoolean = (raw: unknown): Result<DomainValue> =>
  match(raw)
    .with(true, 1, () => Result.of(true))
    .with(false, 0, () => Result.of(false))
    .otherwise(value => violation("Expected a boolean", value));

const decodeRawEnum = (domain: EnumDomain, raw: unknown): Result<DomainValue> =>
  typeof raw === "number" &&
  Number.isInteger(raw) &&
  raw >= 0 &&
  raw < domain.labels.length
    ? Result.of(domain.labels[raw])
    : violation(
        `Unexpected enumeration code, expected 0..${domain.labels.length - 1}`,
        raw
      );

const decodeRawNumeric = (
  domain: NumericDomain,
  raw: unknown
): Result<DomainValue> => {
  if (typeof raw !== "number" || !Number.isFinite(raw)) {
    return violation("Expected a number", raw);
  }

  const scaled = raw * domain.scale;
  if (!inRange(domain, scaled)) {
    return violation(`Expected ${domain.min}..${domain.max}`, scaled);
  }
  return Result.of(round(scaled, domain.precision));
};

/**
 * Validates a value as reported by the controller and converts it to the
 * normalized domain value
 */
export const decodeRaw = (
  domain: ValueDomain,
  raw: unknown
): Result<DomainValue> =>
  match(domain)
    .with({ kind: "boolean" }, () => decodeRawBoolean(raw))
    .with({ kind: "enum" }, d => decodeRawEnum(d, raw))
    .with({ kind: "numeric" }, d => decodeRawNumeric(d, raw))
    .exhaustive();

/** MQTT payload for a normalized value */
export const encodePayload = (value: DomainValue): string =>
  typeof value === "boolean"
    ? value
      ? PAYLOAD_ON
      : PAYLOAD_OFF
    : String(value);

/**
 * Parses a command payload. Booleans take ON/OFF or true/false in any case,
 * enumerations their labels, numbers plain decimals.
 */
export const decodePayload = (
  domain: ValueDomain,
  payload: string
): Result<DomainValue> => {
  const text = payload.trim();
  return match(domain)
    .with({ kind: "boolean" }, () =>
      match(text.toUpperCase())
        .with(PAYLOAD_ON, "TRUE", () => Result.of(true))
        .with(PAYLOAD_OFF, "FALSE", () => Result.of(false))
        .otherwise(() => violation("Expected ON or OFF", payload))
    )
    .with({ kind: "enum" }, d =>
      d.labels.includes(text)
        ? Result.of(text)
        : violation(`Expected one of ${d.labels.join(", ")}`, payload)
    )
    .with({ kind: "numeric" }, d => {
      if (!NUMBER_PATTERN.test(text)) {
        return violation("Expected a number", payload);
      }
      const value = Number.parseFloat(text);
      return inRange(d, value)
        ? Result.of(value)
        : violation(`Expected ${d.min}..${d.max}`, value);
    })
    .exhaustive();
};

/** Controller representation of a normalized value */
export const encodeRaw = (
  domain: ValueDomain,
  value: DomainValue
): { value: RawCallValue; type: RawValueType } =>
  match(domain)
    .with({ kind: "boolean" }, () => ({
      value: value === true,
      type: "boolean" as const,
    }))
    .with({ kind: "enum" }, d => ({
      value: d.labels.indexOf(String(value)),
      type: "integer" as const,
    }))
    .with({ kind: "numeric" }, d => ({
      value: Number(value) / d.scale,
      type: "double" as const,
    }))
    .exhaustive();
