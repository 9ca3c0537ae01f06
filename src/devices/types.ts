/**
 * Shapes of the static device model: what a device type looks like, which
 * channels it has and which values those channels carry.
 */

/** Normalized value of a datapoint after decoding */
export type DomainValue = boolean | number | string;

export type BooleanDomain = { kind: "boolean" };

/** Raw integer codes index `labels` */
export type EnumDomain = { kind: "enum"; labels: readonly string[] };

/** normalized = raw × scale, rounded to `precision` decimals */
export type NumericDomain = {
  kind: "numeric";
  min: number;
  max: number;
  scale: number;
  precision: number;
  unit?: string;
};

export type ValueDomain = BooleanDomain | EnumDomain | NumericDomain;

/**
 * read  - value is state, cached and published retained
 * write - accepts commands
 * event - the controller pushes changes
 */
export type Capability = "read" | "write" | "event";

export type ComponentKind =
  | "sensor"
  | "binary_sensor"
  | "cover"
  | "switch"
  | "device_automation";

export type DiscoveryShape =
  | { component: "sensor"; deviceClass?: string; stateClass?: string }
  | { component: "binary_sensor"; deviceClass?: string }
  | { component: "switch" }
  | {
      component: "cover";
      deviceClass: "shutter" | "blind";
      /** write-only sibling datapoint taking up/down/stop */
      movement: string;
      /** channel whose `level` reports the actual position */
      positionChannel?: number;
    };

/**
 * transition - fires once whenever the state changes between two known values
 * occurrence - fires on every event (button presses)
 */
export type TriggerSpec = {
  mode: "transition" | "occurrence";
  type: string;
};

export type RawCallValue = boolean | number | string;
export type RawValueType = "boolean" | "integer" | "double" | "string";

/** A single setValue on the controller */
export type ControllerWrite = {
  parameter: string;
  value: RawCallValue;
  type: RawValueType;
};

export interface DatapointSpec {
  readonly name: string;
  readonly title: string;
  readonly parameter: string;
  readonly domain: ValueDomain;
  readonly capabilities: readonly Capability[];
  readonly trigger?: TriggerSpec;
  /** value assumed before the first observation, used for edge detection */
  readonly resting?: DomainValue;
  /** true for the flag that reports the device as unreachable */
  readonly availability?: boolean;
  /**
   * Controller flags of the same channel whose disjunction is this value.
   * Such a datapoint is never reported by the controller itself.
   */
  readonly summarizes?: readonly string[];
  readonly discovery?: DiscoveryShape;
  /** enum writes that need a different controller call per label */
  readonly writes?: Readonly<Record<string, ControllerWrite>>;
}

export interface ChannelRole {
  /** controller channel type, e.g. SMOKE_DETECTOR */
  readonly type: string;
  readonly datapoints: readonly DatapointSpec[];
}

export interface DeviceTypeDescriptor {
  /** controller model name, e.g. HmIP-SWSD */
  readonly model: string;
  readonly manufacturer: string;
  readonly channels: Readonly<Record<number, ChannelRole>>;
}

export const hasCapability = (
  spec: DatapointSpec,
  capability: Capability
): boolean => spec.capabilities.includes(capability);
