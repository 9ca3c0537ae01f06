/**
 * Supported Homematic IP models. Supporting another model means adding a
 * descriptor here; nothing else changes.
 *
 * Channel layouts follow the controller's device descriptions, e.g. HmIP-BROLL
 * reports channel 0 as MAINTENANCE, 1-2 as KEY_TRANSCEIVER, 3 as
 * SHUTTER_TRANSMITTER and 4-6 as SHUTTER_VIRTUAL_RECEIVER.
 */

import type {
  ChannelRole,
  DatapointSpec,
  DeviceTypeDescriptor,
  NumericDomain,
} from "./types.ts";

const MANUFACTURER = "eQ-3";

const PERCENT: NumericDomain = {
  kind: "numeric",
  min: 0,
  max: 100,
  scale: 100,
  precision: 0,
  unit: "%",
};

const lowBattery: DatapointSpec = {
  name: "low_battery",
  title: "Low battery",
  parameter: "LOW_BAT",
  domain: { kind: "boolean" },
  capabilities: ["read", "event"],
  discovery: { component: "binary_sensor", deviceClass: "battery" },
};

const unreachable: DatapointSpec = {
  name: "unreachable",
  title: "Unreachable",
  parameter: "UNREACH",
  domain: { kind: "boolean" },
  capabilities: ["read", "event"],
  availability: true,
};

const MAINTENANCE_FLAGS = [
  "ACTUAL_TEMPERATURE_STATUS",
  "CONFIG_PENDING",
  "DUTY_CYCLE",
  "ERROR_CODE",
  "ERROR_OVERHEAT",
  "LOW_BAT",
  "OPERATING_VOLTAGE_STATUS",
  "SABOTAGE",
  "TIME_OF_OPERATION_STATUS",
  "UNREACH",
];

const needsMaintenance: DatapointSpec = {
  name: "maintenance",
  title: "Maintenance",
  parameter: "MAINTENANCE",
  domain: { kind: "boolean" },
  capabilities: ["read"],
  summarizes: MAINTENANCE_FLAGS,
  discovery: { component: "binary_sensor", deviceClass: "problem" },
};

const maintenance = ({ battery }: { battery: boolean }): ChannelRole => ({
  type: "MAINTENANCE",
  datapoints: battery
    ? [lowBattery, unreachable, needsMaintenance]
    : [unreachable, needsMaintenance],
});

const keyPress = (
  name: string,
  title: string,
  parameter: string,
  type: string
): DatapointSpec => ({
  name,
  title,
  parameter,
  domain: { kind: "boolean" },
  capabilities: ["event"],
  trigger: { mode: "occurrence", type },
});

const keyTransceiver: ChannelRole = {
  type: "KEY_TRANSCEIVER",
  datapoints: [
    keyPress("press_short", "Short press", "PRESS_SHORT", "button_short_press"),
    keyPress("press_long", "Long press", "PRESS_LONG", "button_long_press"),
  ],
};

const shutterTransmitter: ChannelRole = {
  type: "SHUTTER_TRANSMITTER",
  datapoints: [
    {
      name: "level",
      title: "Position",
      parameter: "LEVEL",
      domain: PERCENT,
      capabilities: ["read", "event"],
      discovery: { component: "sensor", stateClass: "measurement" },
    },
  ],
};

const shutterReceiver = (positionChannel?: number): ChannelRole => ({
  type: "SHUTTER_VIRTUAL_RECEIVER",
  datapoints: [
    {
      name: "level",
      title: "Shutter",
      parameter: "LEVEL",
      domain: PERCENT,
      capabilities: ["read", "write", "event"],
      discovery: {
        component: "cover",
        deviceClass: "shutter",
        movement: "movement",
        positionChannel,
      },
    },
    {
      name: "movement",
      title: "Movement",
      parameter: "LEVEL",
      domain: { kind: "enum", labels: ["up", "down", "stop"] },
      capabilities: ["write"],
      writes: {
        up: { parameter: "LEVEL", value: 1, type: "double" },
        down: { parameter: "LEVEL", value: 0, type: "double" },
        stop: { parameter: "STOP", value: true, type: "boolean" },
      },
    },
  ],
});

const rotaryHandle: ChannelRole = {
  type: "ROTARY_HANDLE_TRANSCEIVER",
  datapoints: [
    {
      name: "state",
      title: "Window handle",
      parameter: "STATE",
      domain: { kind: "enum", labels: ["closed", "tilted", "open"] },
      capabilities: ["read", "event"],
      trigger: { mode: "transition", type: "handle_moved" },
      discovery: { component: "sensor", deviceClass: "enum" },
    },
  ],
};

const smokeDetector: ChannelRole = {
  type: "SMOKE_DETECTOR",
  datapoints: [
    {
      name: "alarm",
      title: "Smoke alarm",
      parameter: "ALARM",
      domain: { kind: "boolean" },
      capabilities: ["read", "event"],
      resting: false,
      trigger: { mode: "transition", type: "alarm_changed" },
      discovery: { component: "binary_sensor", deviceClass: "smoke" },
    },
    {
      name: "alarm_status",
      title: "Alarm status",
      parameter: "SMOKE_DETECTOR_ALARM_STATUS",
      domain: {
        kind: "enum",
        labels: ["off", "primary", "intrusion", "secondary"],
      },
      capabilities: ["read", "event"],
      discovery: { component: "sensor", deviceClass: "enum" },
    },
  ],
};

const switchTransmitter: ChannelRole = {
  type: "SWITCH_TRANSMITTER",
  datapoints: [
    {
      name: "state",
      title: "Switch state",
      parameter: "STATE",
      domain: { kind: "boolean" },
      capabilities: ["read", "event"],
      discovery: { component: "binary_sensor", deviceClass: "power" },
    },
  ],
};

const switchReceiver: ChannelRole = {
  type: "SWITCH_VIRTUAL_RECEIVER",
  datapoints: [
    {
      name: "state",
      title: "Switch",
      parameter: "STATE",
      domain: { kind: "boolean" },
      capabilities: ["read", "write", "event"],
      discovery: { component: "switch" },
    },
  ],
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

export const DEVICE_TYPES = deepFreeze<readonly DeviceTypeDescriptor[]>([
  {
    model: "HmIP-BROLL",
    manufacturer: MANUFACTURER,
    channels: {
      0: maintenance({ battery: false }),
      1: keyTransceiver,
      2: keyTransceiver,
      3: shutterTransmitter,
      4: shutterReceiver(3),
      5: shutterReceiver(),
      6: shutterReceiver(),
    },
  },
  {
    model: "HmIP-SRH",
    manufacturer: MANUFACTURER,
    channels: {
      0: maintenance({ battery: true }),
      1: rotaryHandle,
    },
  },
  {
    model: "HmIP-SWSD",
    manufacturer: MANUFACTURER,
    channels: {
      0: maintenance({ battery: true }),
      1: smokeDetector,
    },
  },
  {
    model: "HmIP-BSM",
    manufacturer: MANUFACTURER,
    channels: {
      0: maintenance({ battery: false }),
      1: keyTransceiver,
      2: keyTransceiver,
      3: switchTransmitter,
      4: switchReceiver,
      5: switchReceiver,
      6: switchReceiver,
    },
  },
]);

export const findDeviceType = (
  model: string,
  types: readonly DeviceTypeDescriptor[] = DEVICE_TYPES
): DeviceTypeDescriptor | undefined => types.find(t => t.model === model);
