import * as Sentry from "@sentry/node";
import { describe, expect, it, vi } from "vitest";
import { initSentry } from "../../src/instrument.ts";

vi.mock("@sentry/node", () => ({
  init: vi.fn(),
  processSessionIntegration: vi.fn(() => ({ name: "ProcessSession" })),
  localVariablesIntegration: vi.fn(() => ({ name: "LocalVariables" })),
  zodErrorsIntegration: vi.fn(() => ({ name: "ZodErrors" })),
}));

describe("initSentry", () => {
  it("should not initialize anything on import", () => {
    expect(Sentry.init).not.toHaveBeenCalled();
  });

  it("should stay inactive without a DSN", () => {
    initSentry("");

    expect(Sentry.init).toHaveBeenCalledOnce();
    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({ dsn: undefined, environment: "test" })
    );
  });

  it("should report to the configured DSN", () => {
    initSentry("https://test-key@sentry.example/1");

    expect(Sentry.init).toHaveBeenCalledWith(
      expect.objectContaining({ dsn: "https://test-key@sentry.example/1" })
    );
  });
});
