import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import mqtt, { type IClientOptions, type MqttClient } from "mqtt";
import type { MessagingLink } from "../bridge.ts";
import { StartupError } from "../errors.ts";
import { createLogger } from "../logger.ts";
import type { InboundMessage, Publication } from "../translate/types.ts";
import { cloakUrl, truncate } from "../utility.ts";

const log = createLogger("mqtt");

const raise = (message: string): never => {
  throw new Error(message);
};

export interface MqttOptions {
  /** mqtt:// or mqtts://, credentials in the URL */
  broker: URL;
  /** topic where the consumer announces "online" after its restarts */
  statusTopic: string;
  clientId?: string;
}

/**
 * MQTT side of the bridge. Emits `reconnected` after every connect but the
 * first one and when the consumer announces itself online again.
 */
export class MqttLink
  extends EventEmitter<{
    message: [InboundMessage];
    reconnected: [];
    error: [Error];
  }>
  implements MessagingLink
{
  private readonly options: MqttOptions;
  private client?: MqttClient;

  constructor(options: MqttOptions) {
    super();
    this.options = options;
  }

  start = async (): Promise<void> => {
    const { broker } = this.options;
    const clientOptions: IClientOptions = {
      clientId: this.options.clientId ?? `hm-mqtt-bridge-${randomUUID()}`,
      clean: true,
      connectTimeout: 10_000,
      reconnectPeriod: 5_000,
      ...(broker.username
        ? { username: decodeURIComponent(broker.username) }
        : {}),
      ...(broker.password
        ? { password: decodeURIComponent(broker.password) }
        : {}),
    };

    let client: MqttClient;
    try {
      client = await mqtt.connectAsync(
        `${broker.protocol}//${broker.host}`,
        clientOptions
      );
    } catch (error) {
      throw new StartupError(
        `Cannot connect to MQTT broker ${cloakUrl(broker)}`,
        {},
        { cause: error }
      );
    }

    this.client = client
      .on("connect", () => {
        log.info("mqtt.reconnected");
        this.emit("reconnected");
      })
      .on("offline", () => log.warn("mqtt.offline"))
      .on("error", error => this.emit("error", error))
      .on("message", this.received);

    log.info("mqtt.connected", { broker: cloakUrl(broker) });
  };

  subscribe = async (topics: string[]): Promise<void> => {
    const client = this.connected();
    await client.subscribeAsync(topics, { qos: 1 });
    log.debug("mqtt.subscribed", { topics });
  };

  publish = async ({ topic, payload, retain }: Publication): Promise<void> => {
    const client = this.connected();
    await client.publishAsync(topic, payload, { qos: 1, retain });
  };

  stop = async (): Promise<void> => {
    const client = this.client;
    this.client = undefined;
    if (client) {
      client.removeAllListeners("connect");
      await client.endAsync();
      log.info("mqtt.stopped");
    }
  };

  private connected = (): MqttClient =>
    this.client ?? raise("MQTT client is not started");

  private received = (topic: string, payload: Buffer): void => {
    const text = payload.toString("utf8");

    if (topic === this.options.statusTopic) {
      if (text.trim() === "online") {
        log.info("mqtt.consumer_online", { topic });
        this.emit("reconnected");
      }
      return;
    }

    log.debug("mqtt.message", { topic, payload: truncate(text, 100) });
    this.emit("message", { id: randomUUID(), topic, payload: text });
  };
}
