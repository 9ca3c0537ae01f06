import * as Sentry from "@sentry/node";

/**
 * Error reporting and log forwarding, set up once the configuration is
 * loaded. Without a DSN the SDK stays inactive and the logger only writes
 * locally.
 */
export const initSentry = (dsn: string | undefined) =>
  Sentry.init({
    dsn: dsn || undefined,
    environment: process.env.NODE_ENV,
    release: process.env.SENTRY_RELEASE,
    enableLogs: true,
    tracesSampleRate: 0,
    integrations: [
      Sentry.processSessionIntegration(),
      Sentry.localVariablesIntegration({ captureAllExceptions: true }),
      Sentry.zodErrorsIntegration(),
    ],
    includeLocalVariables: true,
    sendClientReports: true,
  });
