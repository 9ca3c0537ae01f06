import dotenv from "dotenv";
import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { StartupError } from "./errors.ts";

export const DEFAULT_CONFIG_FILE = "/var/lib/hm-mqtt-bridge/config.json";

const ENVIRONMENT: Record<string, string> = {
  broker: "MQTT_BROKER",
  connect: "CCU_CONNECT",
  listen: "CCU_LISTEN",
  callback: "CCU_CALLBACK",
  interfaceId: "CCU_INTERFACE_ID",
  namespace: "MQTT_NAMESPACE",
  discoveryPrefix: "DISCOVERY_PREFIX",
  inventory: "INVENTORY_FILE",
  queueCapacity: "QUEUE_CAPACITY",
  callTimeout: "CALL_TIMEOUT",
  pingInterval: "PING_INTERVAL",
  inventoryTimeout: "INVENTORY_TIMEOUT",
  shutdownTimeout: "SHUTDOWN_TIMEOUT",
  sentryDsn: "SENTRY_DSN",
};

/**
 * Parses a URL, defaulting the scheme when the value is just "host:port"
 */
const url = (defaultScheme: string) =>
  z.string().transform((value, ctx) => {
    try {
      return new URL(
        value.includes("://") ? value : `${defaultScheme}://${value}`
      );
    } catch {
      ctx.addIssue({ code: "custom", message: `Invalid URL: ${value}` });
      return z.NEVER;
    }
  });

const BrokerUrlSchema = url("mqtt").refine(
  broker => ["mqtt:", "mqtts:"].includes(broker.protocol) && !!broker.hostname,
  "Broker must be an mqtt:// or mqtts:// URL with a host"
);

const ListenUrlSchema = url("xmlrpc").refine(
  listen => listen.protocol === "xmlrpc:" && !!listen.hostname,
  "Listen address must be an xmlrpc:// URL with a host"
);

const ControllerUrlSchema = ListenUrlSchema.refine(
  connect => connect.port !== "",
  "CCU address must carry a port, e.g. xmlrpc://ccu.local:2010"
);

const CallbackUrlSchema = url("http").refine(
  callback => ["http:", "https:"].includes(callback.protocol),
  "Callback must be an http:// or https:// URL"
);

/** One MQTT topic level: no separators, no wildcards */
const TopicLevelSchema = z
  .string()
  .regex(/^[^/#+]+$/, "Must be a single topic level without wildcards");

const Milliseconds = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  broker: BrokerUrlSchema.prefault("mqtt://localhost"),
  connect: ControllerUrlSchema,
  listen: ListenUrlSchema.prefault("xmlrpc://0.0.0.0"),
  callback: CallbackUrlSchema.optional(),
  interfaceId: z.string().min(1).default("hm-mqtt-bridge"),
  namespace: TopicLevelSchema.default("Homematic"),
  discoveryPrefix: TopicLevelSchema.default("homeassistant"),
  inventory: z.string().min(1).optional(),
  queueCapacity: z.coerce.number().int().positive().default(1000),
  callTimeout: Milliseconds.default(10_000),
  pingInterval: Milliseconds.default(30_000),
  inventoryTimeout: Milliseconds.default(60_000),
  shutdownTimeout: Milliseconds.default(5_000),
  debug: z.boolean().default(false),
  sentryDsn: z.string().default(""),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Values given on the command line; undefined means "not given" */
export type ConfigOverrides = Partial<Record<keyof Config, unknown>> & {
  config?: string;
};

const definedOnly = (values: Record<string, unknown>) =>
  Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined)
  );

const fromEnvironment = (): Record<string, unknown> =>
  definedOnly(
    Object.fromEntries(
      Object.entries(ENVIRONMENT).map(([key, name]) => [
        key,
        process.env[name],
      ])
    )
  );

/**
 * The default file is optional; a file given explicitly must exist
 */
const fromFile = (path: string | undefined): Record<string, unknown> => {
  const filename = path ?? DEFAULT_CONFIG_FILE;
  if (!path && !existsSync(filename)) {
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filename, "utf8"));
  } catch (error) {
    throw new StartupError(
      `Failed to read configuration file ${filename}`,
      { filename },
      { cause: error }
    );
  }

  const parsed = z.record(z.string(), z.unknown()).safeParse(content);
  if (!parsed.success) {
    throw new StartupError(
      `Configuration file ${filename} must contain a JSON object`,
      { filename }
    );
  }
  return parsed.data;
};

/**
 * Defaults ← environment (.env included) ← configuration file ← overrides
 *
 * @throws StartupError for an unreadable file or invalid values
 */
export const loadConfig = (overrides: ConfigOverrides = {}): Config => {
  dotenv.config();

  const { config: path, ...flags } = overrides;
  const merged = {
    ...fromEnvironment(),
    ...fromFile(path ?? process.env.CONFIG_FILE),
    ...definedOnly(flags),
  };

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new StartupError(
      `Invalid configuration:\n${z.prettifyError(parsed.error)}`
    );
  }
  return parsed.data;
};
