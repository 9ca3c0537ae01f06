import type { ComponentKind } from "./devices/types.ts";

/**
 * Identifies one datapoint of one channel
 */
export interface DatapointRef {
  address: string;
  channel: number;
  datapoint: string;
}

/**
 * Addresses are used as topic segments, so everything outside
 * [A-Za-z0-9_-] (including MQTT wildcards and separators) becomes "_"
 */
export const topicSegment = (address: string): string =>
  address.replace(/[^A-Za-z0-9_-]/g, "_");

/**
 * MQTT topic layout:
 *   state         <namespace>/<address>/<channel>/<datapoint>
 *   command       <state>/set
 *   trigger       <state>/trigger
 *   attributes    <namespace>/<address>/<channel>/attributes
 *   availability  <namespace>/<address>/availability
 *   discovery     <prefix>/<component>/<address>_<channel>/<datapoint>/config
 */
export class TopicScheme {
  readonly namespace: string;
  readonly discoveryPrefix: string;

  constructor(namespace: string, discoveryPrefix: string) {
    this.namespace = namespace;
    this.discoveryPrefix = discoveryPrefix;
  }

  state = ({ address, channel, datapoint }: DatapointRef): string =>
    `${this.namespace}/${topicSegment(address)}/${channel}/${datapoint}`;

  command = (ref: DatapointRef): string => `${this.state(ref)}/set`;

  trigger = (ref: DatapointRef): string => `${this.state(ref)}/trigger`;

  attributes = (address: string, channel: number): string =>
    `${this.namespace}/${topicSegment(address)}/${channel}/attributes`;

  availability = (address: string): string =>
    `${this.namespace}/${topicSegment(address)}/availability`;

  discovery = (
    component: ComponentKind,
    { address, channel, datapoint }: DatapointRef
  ): string =>
    `${this.discoveryPrefix}/${component}/${topicSegment(address)}_${channel}/${datapoint}/config`;

  /** Subscription covering every command topic */
  commandFilter = (): string => `${this.namespace}/+/+/+/set`;

  /** Home Assistant announces its restarts here */
  consumerStatus = (): string => `${this.discoveryPrefix}/status`;
}
