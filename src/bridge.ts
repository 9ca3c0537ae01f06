import type { EventEmitter } from "node:events";
import { DeviceRegistry, type InventoryEntry } from "./device.ts";
import type { DeviceTypeDescriptor } from "./devices/types.ts";
import { DiscoveryPublisher, type DiscoveryOrigin } from "./discovery.ts";
import {
  ControllerCallError,
  isBridgeError,
  StartupError,
  TransportLossError,
} from "./errors.ts";
import { createLogger, type LogExtra } from "./logger.ts";
import { BoundedQueue } from "./queue.ts";
import { StateCache } from "./state.ts";
import type { TopicScheme } from "./topics.ts";
import { CommandTranslator } from "./translate/commands.ts";
import { EventTranslator } from "./translate/events.ts";
import type {
  Command,
  ControllerCall,
  InboundMessage,
  Publication,
  RawEvent,
} from "./translate/types.ts";
import { Result, withTimeout } from "./utility.ts";

const log = createLogger("bridge");

/**
 * The device controller (CCU) side of the bridge
 */
export interface ControllerLink
  extends EventEmitter<{
    event: [RawEvent];
    inventory: [InventoryEntry[]];
    deleted: [string[]];
    reconnected: [];
    error: [Error];
  }> {
  start(): Promise<void>;
  setValue(call: ControllerCall): Promise<void>;
  stop(): Promise<void>;
}

/**
 * The MQTT broker side of the bridge
 */
export interface MessagingLink
  extends EventEmitter<{
    message: [InboundMessage];
    reconnected: [];
    error: [Error];
  }> {
  start(): Promise<void>;
  subscribe(topics: string[]): Promise<void>;
  publish(publication: Publication): Promise<void>;
  stop(): Promise<void>;
}

export interface BridgeOptions {
  topics: TopicScheme;
  origin: DiscoveryOrigin;
  queueCapacity: number;
  /** ms */
  callTimeout: number;
  /** ms */
  inventoryTimeout: number;
  /** ms */
  shutdownTimeout: number;
  types?: readonly DeviceTypeDescriptor[];
}

/** Resolves to false instead of rejecting when `ms` elapse first */
const settlesWithin = (promise: Promise<unknown>, ms: number) =>
  withTimeout(
    promise.then(() => true),
    ms,
    () => new Error("timeout")
  ).catch(() => false);

/**
 * Moves controller events to MQTT and MQTT commands to the controller.
 *
 * Each direction has its own bounded queue and consumer loop. Inventory
 * changes and re-publication after a reconnect run on a serial task chain
 * that the event loop waits for before every event, so no event is published
 * while discovery is being rebuilt.
 */
export class Bridge {
  readonly registry: DeviceRegistry;
  readonly cache = new StateCache();

  private readonly controller: ControllerLink;
  private readonly messaging: MessagingLink;
  private readonly options: BridgeOptions;
  private readonly eventTranslator: EventTranslator;
  private readonly commandTranslator: CommandTranslator;
  private readonly discovery: DiscoveryPublisher;
  private readonly events: BoundedQueue<RawEvent>;
  private readonly commands: BoundedQueue<InboundMessage>;

  private inflight = new Map<
    number,
    { label: string; done: Promise<unknown> }
  >();
  private operationId = 0;
  private release: () => void = () => {};
  private gate: Promise<void> = new Promise(resolve => {
    this.release = resolve;
  });
  private loops?: Promise<unknown>;
  private stopping?: Promise<void>;

  constructor(
    controller: ControllerLink,
    messaging: MessagingLink,
    options: BridgeOptions
  ) {
    this.controller = controller;
    this.messaging = messaging;
    this.options = options;

    this.registry = new DeviceRegistry(options.topics, options.types);
    this.eventTranslator = new EventTranslator(
      this.registry,
      this.cache,
      options.topics
    );
    this.commandTranslator = new CommandTranslator(
      this.registry,
      options.topics
    );
    this.discovery = new DiscoveryPublisher(options.topics, options.origin);
    this.events = new BoundedQueue(options.queueCapacity);
    this.commands = new BoundedQueue(options.queueCapacity);
  }

  /**
   * Connects both sides, registers the first inventory and publishes
   * discovery. Without `inventory` the first one the controller reports is
   * used.
   *
   * @throws StartupError when no inventory arrives within `inventoryTimeout`
   * or it holds no supported device
   */
  start = async (inventory?: InventoryEntry[]): Promise<void> => {
    const { topics, inventoryTimeout } = this.options;

    this.controller
      .on("event", this.enqueueEvent)
      .on("inventory", this.inventoryChanged)
      .on("deleted", this.devicesDeleted)
      .on("reconnected", this.controllerReconnected)
      .on("error", this.controllerFailed);
    this.messaging
      .on("message", this.enqueueCommand)
      .on("reconnected", this.messagingReconnected)
      .on("error", this.messagingFailed);

    const first = inventory
      ? Promise.resolve(inventory)
      : new Promise<InventoryEntry[]>(resolve =>
          this.controller.once("inventory", resolve)
        );

    await this.messaging.start();
    await this.messaging.subscribe([
      topics.commandFilter(),
      topics.consumerStatus(),
    ]);
    await this.controller.start();

    const entries = await withTimeout(
      first,
      inventoryTimeout,
      () =>
        new StartupError(
          `No device inventory received within ${inventoryTimeout} ms`,
          { inventoryTimeout }
        )
    );
    if (entries.length === 0) {
      throw new StartupError("Device inventory is empty");
    }

    const report = this.registry.register(entries);
    if (this.registry.size === 0) {
      throw new StartupError("Device inventory holds no supported device", {
        unsupported: report.unsupported.map(e => `${e.address} (${e.model})`),
      });
    }

    log.info("bridge.inventory", {
      devices: this.registry.size,
      unsupported: this.registry
        .unsupported()
        .map(e => `${e.address} (${e.model})`),
      conflicts: report.conflicts.length,
    });

    await this.republish();
    this.release();
    this.loops = Promise.all([this.runEvents(), this.runCommands()]);
    log.info("bridge.started");
  };

  /**
   * Closes the queues, lets the loops drain and waits up to
   * `shutdownTimeout` for in-flight operations and for both sides to stop.
   */
  stop = (): Promise<void> => {
    this.stopping ??= this.shutdown();
    return this.stopping;
  };

  /**
   * Sends one command to the controller. Failures and timeouts are logged
   * and returned, never retried.
   */
  execute = async (command: Command): Promise<Result<Command>> => {
    const { call } = command;
    const target = `${call.address}:${call.channel}`;
    const details = { target, parameter: call.parameter, value: call.value };

    try {
      await this.track(
        `setValue ${target} ${call.parameter}`,
        withTimeout(
          this.controller.setValue(call),
          this.options.callTimeout,
          () =>
            new ControllerCallError(
              `setValue did not complete within ${this.options.callTimeout} ms`,
              details
            )
        )
      );
    } catch (error) {
      const failure =
        error instanceof ControllerCallError
          ? error
          : new ControllerCallError(`setValue failed for ${target}`, details, {
              cause: error,
            });
      log.error("command.failed", failure, {
        ...failure.details,
        messageId: command.messageId,
      });
      return Result.throw(failure);
    }

    log.debug("command.executed", { ...details, messageId: command.messageId });
    return Result.of(command);
  };

  private shutdown = async (): Promise<void> => {
    const { shutdownTimeout } = this.options;
    const deadline = Date.now() + shutdownTimeout;

    this.events.close();
    this.commands.close();
    // Lets the loops finish even if startup never completed
    this.release();

    if (this.loops) {
      await settlesWithin(this.loops, shutdownTimeout);
    }
    await settlesWithin(
      this.settleInflight(),
      Math.max(0, deadline - Date.now())
    );

    const abandoned = [...this.inflight.values()].map(({ label }) => label);
    if (abandoned.length > 0 || this.events.size + this.commands.size > 0) {
      log.warn("bridge.abandoned", {
        operations: abandoned,
        events: this.events.size,
        commands: this.commands.size,
      });
    }

    this.controller
      .off("event", this.enqueueEvent)
      .off("inventory", this.inventoryChanged)
      .off("deleted", this.devicesDeleted)
      .off("reconnected", this.controllerReconnected)
      .off("error", this.controllerFailed);
    this.messaging
      .off("message", this.enqueueCommand)
      .off("reconnected", this.messagingReconnected)
      .off("error", this.messagingFailed);

    await Promise.all([
      this.stopSide("controller", this.controller.stop(), deadline),
      this.stopSide("messaging", this.messaging.stop(), deadline),
    ]);
    log.info("bridge.stopped");
  };

  /** Waits for one side to disconnect until the shutdown deadline */
  private stopSide = async (
    side: string,
    stopping: Promise<void>,
    deadline: number
  ): Promise<void> => {
    const ms = Math.max(0, deadline - Date.now());
    const timeout = new Error(`${side} did not stop within ${ms} ms`);
    try {
      await withTimeout(stopping, ms, () => timeout);
    } catch (error) {
      if (error === timeout) {
        log.warn("bridge.abandoned", { operations: [`${side}.stop`] });
      } else {
        log.error("bridge.stop_failed", error, { side });
      }
    }
  };

  private settleInflight = async (): Promise<void> => {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight.values()].map(op => op.done));
    }
  };

  private runEvents = async (): Promise<void> => {
    for await (const raw of this.events) {
      await this.gate;
      try {
        await this.handleEvent(raw);
      } catch (error) {
        log.error("event.failed", error, { ...raw });
      }
    }
  };

  private runCommands = async (): Promise<void> => {
    for await (const message of this.commands) {
      try {
        await this.handleCommand(message);
      } catch (error) {
        log.error("command.failed", error, { topic: message.topic });
      }
    }
  };

  private handleEvent = (raw: RawEvent): Promise<void> =>
    this.eventTranslator.translate(raw).fold<Promise<void>>(
      ({ publications }) => this.publish(publications),
      error => {
        const extra = {
          address: raw.address,
          channel: raw.channel,
          parameter: raw.parameter,
        };
        if (this.registry.isUnsupported(raw.address)) {
          log.debug("event.unsupported_device", extra);
        } else {
          this.rejected("event.rejected", error, extra);
        }
        return Promise.resolve();
      }
    );

  private handleCommand = async (message: InboundMessage): Promise<void> => {
    await this.commandTranslator.translate(message).fold<Promise<void>>(
      command => this.execute(command).then(() => undefined),
      error => {
        this.rejected("command.rejected", error, {
          topic: message.topic,
          payload: message.payload,
        });
        return Promise.resolve();
      }
    );
  };

  private rejected = (event: string, error: Error, extra: LogExtra) => {
    if (isBridgeError(error)) {
      log.warn(event, {
        ...extra,
        ...error.details,
        kind: error.kind,
        reason: error.message,
      });
    } else {
      log.error(event, error, extra);
    }
  };

  /** Discovery for the whole registry, then the cached state */
  private republish = async (): Promise<void> => {
    await this.publish(this.discovery.publishAll(this.registry));
    await this.publish(this.discovery.retainedState(this.registry, this.cache));
  };

  private publish = async (publications: Publication[]): Promise<void> => {
    const results = await Promise.allSettled(
      publications.map(publication =>
        this.track(
          `publish ${publication.topic}`,
          this.messaging.publish(publication)
        )
      )
    );

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        const topic = publications[i]?.topic;
        log.error(
          "mqtt.publish_failed",
          new TransportLossError(
            `Publishing to ${topic} failed`,
            { topic },
            { cause: result.reason }
          )
        );
      }
    });
  };

  private track = <T>(label: string, promise: Promise<T>): Promise<T> => {
    const id = ++this.operationId;
    const done = promise.finally(() => this.inflight.delete(id));
    this.inflight.set(id, { label, done });
    return done;
  };

  /** Serializes a task with the event loop */
  private schedule = (name: string, task: () => Promise<void>): void => {
    this.gate = this.gate
      .then(task)
      .catch((error: unknown) => log.error(`bridge.${name}_failed`, error));
  };

  private enqueueEvent = (raw: RawEvent): void => {
    if (!this.events.push(raw) && !this.events.isClosed) {
      log.warn("queue.event_dropped", { capacity: this.events.capacity });
    }
  };

  private enqueueCommand = (message: InboundMessage): void => {
    if (!this.commands.push(message) && !this.commands.isClosed) {
      log.warn("queue.command_dropped", { capacity: this.commands.capacity });
    }
  };

  private inventoryChanged = (entries: InventoryEntry[]): void =>
    this.schedule("inventory", async () => {
      const report = this.registry.register(entries);
      log.info("bridge.inventory_changed", {
        registered: report.registered,
        unchanged: report.unchanged.length,
        unsupported: report.unsupported.length,
        conflicts: report.conflicts.length,
      });
      if (report.registered.length > 0) {
        await this.republish();
      }
    });

  private devicesDeleted = (addresses: string[]): void =>
    this.schedule("deletion", async () => {
      const removed = this.registry.remove(addresses);
      for (const device of removed) {
        this.eventTranslator.forget(device.address);
        await this.publish(this.discovery.removals(device));
      }
      log.info("bridge.devices_removed", {
        removed: removed.map(device => device.address),
      });
    });

  private reconnected = (source: string): void => {
    log.info("bridge.reconnected", { source });
    this.schedule("republish", this.republish);
  };

  private controllerReconnected = () => this.reconnected("controller");
  private messagingReconnected = () => this.reconnected("messaging");

  private controllerFailed = (error: Error) =>
    log.error("controller.error", error);
  private messagingFailed = (error: Error) => log.error("mqtt.error", error);
}
