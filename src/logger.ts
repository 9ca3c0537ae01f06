/**
 * Structured logging for the bridge
 * Writes through the debug module and mirrors entries to Sentry
 */

import * as Sentry from "@sentry/node";
import debug from "debug";

export const LOG_NAMESPACE = "hm-mqtt-bridge";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogExtra = Record<string, unknown>;

/** Signature of a debug instance; tests substitute plain mocks */
export type LogWriter = (formatter: string, ...args: unknown[]) => void;
export type LogWriters = Record<LogLevel, LogWriter>;

/**
 * Context names the Sentry SDK fills in by itself (OS, runtime, ...). They are
 * visible in Sentry already and only add noise to log lines.
 */
const SENTRY_INTERNAL_CONTEXTS = new Set([
  "os",
  "runtime",
  "app",
  "device",
  "culture",
  "trace",
  "state",
]);

export class Logger {
  private readonly component: string;
  private readonly loggers: LogWriters;

  constructor(component: string, loggers: LogWriters) {
    this.component = component;
    this.loggers = loggers;
  }

  debug(message: string, extra?: LogExtra): void {
    this.log(this.loggers.debug, message, this.withScopeData(extra));
    this.addBreadcrumb("debug", message, extra);
  }

  info(message: string, extra?: LogExtra): void {
    const enriched = this.withScopeData(extra);
    this.log(this.loggers.info, message, enriched);
    this.addBreadcrumb("info", message, extra);
    Sentry.logger.info(message, { component: this.component, ...enriched });
  }

  warn(message: string, extra?: LogExtra): void {
    const enriched = this.withScopeData(extra);
    this.log(this.loggers.warn, message, enriched);
    this.addBreadcrumb("warning", message, extra);
    Sentry.logger.warn(message, { component: this.component, ...enriched });
    Sentry.captureMessage(message, this.captureContext("warning", extra));
  }

  error(message: string, error?: unknown, extra?: LogExtra): void {
    const enriched = this.withScopeData(extra);
    if (error !== undefined) {
      this.loggers.error("%s %O %O", message, error, enriched);
    } else {
      this.log(this.loggers.error, message, enriched);
    }

    this.addBreadcrumb("error", message, extra);
    Sentry.logger.error(message, {
      component: this.component,
      ...enriched,
      error,
    });

    if (error === undefined) {
      Sentry.captureMessage(message, this.captureContext("error", extra));
    } else {
      Sentry.captureException(error, this.captureContext("error", extra));
    }
  }

  /**
   * Uses "%s %O" when there is metadata, "%s" when not
   */
  private log(logFn: LogWriter, message: string, extra: LogExtra): void {
    if (Object.keys(extra).length > 0) {
      logFn("%s %O", message, extra);
    } else {
      logFn("%s", message);
    }
  }

  /**
   * Merges tags and domain contexts from the isolation and current Sentry
   * scopes into the log metadata. Current scope wins on conflicts.
   */
  private withScopeData(data: LogExtra = {}): LogExtra {
    const isolation = Sentry.getIsolationScope().getScopeData();
    const current = Sentry.getCurrentScope().getScopeData();

    const tags = { ...isolation.tags, ...current.tags };
    const contexts = { ...isolation.contexts, ...current.contexts };

    const contextEntries = Object.entries(contexts)
      .filter(([name]) => !SENTRY_INTERNAL_CONTEXTS.has(name))
      .flatMap(([name, context]) =>
        context
          ? Object.entries(context).map(
              ([key, value]): [string, unknown] => [`${name}.${key}`, value]
            )
          : []
      );

    return {
      ...data,
      ...Object.fromEntries(
        Object.entries(tags).map(([key, value]) => [`tag.${key}`, value])
      ),
      ...Object.fromEntries(contextEntries),
    };
  }

  private captureContext = (
    level: Sentry.SeverityLevel,
    extra?: LogExtra
  ): Sentry.CaptureContext => ({
    level,
    tags: { component: this.component },
    ...(extra && Object.keys(extra).length > 0 ? { extra } : {}),
  });

  private addBreadcrumb = (
    level: Sentry.SeverityLevel,
    message: string,
    data: LogExtra | undefined
  ) =>
    Sentry.addBreadcrumb({
      type: level === "debug" || level === "error" ? level : "default",
      level,
      category: this.component.replace(":", "."),
      message,
      ...(data ? { data } : {}),
    });
}

/**
 * Creates a logger for one component, writing to the debug namespaces
 * `hm-mqtt-bridge:<component>:<level>`
 *
 * @param component - component name, e.g. "registry" or "ccu"
 */
export const createLogger = (component: string) =>
  new Logger(component, {
    debug: debug(`${LOG_NAMESPACE}:${component}:debug`),
    info: debug(`${LOG_NAMESPACE}:${component}:info`),
    warn: debug(`${LOG_NAMESPACE}:${component}:warn`),
    error: debug(`${LOG_NAMESPACE}:${component}:error`),
  });

/**
 * Turns on log output. Without `verbose` only info and above are written,
 * unless the DEBUG environment variable already selects namespaces.
 */
export const enableLogging = (verbose: boolean): void => {
  if (verbose) {
    debug.enable(`${LOG_NAMESPACE}:*`);
  } else if (!process.env.DEBUG) {
    debug.enable(`${LOG_NAMESPACE}:*,-${LOG_NAMESPACE}:*:debug`);
  }
};
