import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { DeviceRegistry, loadInventory } from "../../src/device.ts";
import { hasCapability } from "../../src/devices/types.ts";
import type { DatapointRef } from "../../src/topics.ts";
import {
  createRegistry,
  createTopics,
  handleEntry,
  shutterEntry,
  smokeEntry,
  switchEntry,
} from "../factories.ts";

describe("DeviceRegistry", () => {
  describe("register", () => {
    it("should register supported devices with their channels", () => {
      const registry = new DeviceRegistry(createTopics());
      const report = registry.register([shutterEntry(), smokeEntry()]);

      expect(report.registered).toEqual(["0001D3C99C3C93", "A1"]);
      expect(registry.size).toBe(2);
      expect(
        registry.device("0001D3C99C3C93")?.channels.map(c => c.index)
      ).toEqual([0, 1, 2, 3, 4, 5, 6]);
      expect(registry.device("0001D3C99C3C93")?.channelCount).toBe(8);
      expect(registry.lookup("A1", 1)?.role.type).toBe("SMOKE_DETECTOR");
    });

    it("should only create channels the device reports", () => {
      const registry = createRegistry([{ ...smokeEntry(), channels: 1 }]);

      expect(registry.lookup("A1", 0)?.role.type).toBe("MAINTENANCE");
      expect(registry.lookup("A1", 1)).toBeUndefined();
    });

    it("should record unsupported models", () => {
      const registry = new DeviceRegistry(createTopics());
      const report = registry.register([
        { address: "X1", model: "HmIP-UNKNOWN", channels: 3 },
      ]);

      expect(report.unsupported).toEqual([
        { address: "X1", model: "HmIP-UNKNOWN", channels: 3 },
      ]);
      expect(registry.size).toBe(0);
      expect(registry.isUnsupported("X1")).toBe(true);
      expect(registry.unsupported()).toEqual([
        { address: "X1", model: "HmIP-UNKNOWN", channels: 3 },
      ]);
    });

    it("should forget an unsupported entry once its model is known", () => {
      const registry = new DeviceRegistry(createTopics());
      registry.register([{ ...smokeEntry("X1"), model: "HmIP-UNKNOWN" }]);
      registry.register([smokeEntry("X1")]);

      expect(registry.unsupported()).toEqual([]);
      expect(registry.isUnsupported("X1")).toBe(false);
    });

    it("should replace a device that reports more channels", () => {
      const registry = createRegistry([{ ...shutterEntry(), channels: 7 }]);
      const report = registry.register([shutterEntry()]);

      expect(report.registered).toEqual([shutterEntry().address]);
      expect(registry.device(shutterEntry().address)?.channelCount).toBe(8);
    });

    it("should report unchanged devices on repeated registration", () => {
      const registry = createRegistry([smokeEntry()]);
      const report = registry.register([smokeEntry()]);

      expect(report.registered).toEqual([]);
      expect(report.unchanged).toEqual(["A1"]);
    });

    it("should replace a device whose firmware changed", () => {
      const registry = createRegistry([smokeEntry()]);
      const report = registry.register([{ ...smokeEntry(), firmware: "2.0" }]);

      expect(report.registered).toEqual(["A1"]);
      expect(registry.device("A1")?.firmware).toBe("2.0");
    });

    it("should reject devices whose topics collide with another device", () => {
      const registry = createRegistry([smokeEntry("A/1")]);
      const report = registry.register([smokeEntry("A+1")]);

      expect(report.conflicts).toEqual([
        { address: "A+1", owner: "A/1", segment: "A_1" },
      ]);
      expect(registry.device("A+1")).toBeUndefined();
      expect(registry.reverseLookup("Homematic/A_1/1/alarm")).toEqual({
        address: "A/1",
        channel: 1,
        datapoint: "alarm",
      });
    });
  });

  describe("remove", () => {
    it("should drop devices and their topics", () => {
      const registry = createRegistry([smokeEntry(), handleEntry()]);
      const removed = registry.remove(["A1", "unknown"]);

      expect(removed.map(d => d.address)).toEqual(["A1"]);
      expect(registry.lookup("A1", 1)).toBeUndefined();
      expect(registry.reverseLookup("Homematic/A1/1/alarm")).toBeUndefined();
      expect(registry.size).toBe(1);
    });
  });

  describe("reverseLookup", () => {
    it("should map every state and command topic back to its datapoint", () => {
      const topics = createTopics();
      const registry = createRegistry(
        [shutterEntry(), handleEntry(), smokeEntry(), switchEntry()],
        topics
      );

      let checked = 0;
      for (const channel of registry.channels()) {
        for (const spec of channel.role.datapoints) {
          const ref: DatapointRef = {
            address: channel.address,
            channel: channel.index,
            datapoint: spec.name,
          };
          if (hasCapability(spec, "read") || hasCapability(spec, "event")) {
            expect(registry.reverseLookup(topics.state(ref))).toEqual(ref);
            checked++;
          }
          if (hasCapability(spec, "write")) {
            expect(registry.reverseLookup(topics.command(ref))).toEqual(ref);
            checked++;
          }
        }
      }
      expect(checked).toBeGreaterThan(20);
    });

    it("should not resolve unknown topics", () => {
      const registry = createRegistry();
      expect(registry.reverseLookup("Homematic/A1/9/alarm")).toBeUndefined();
      expect(registry.reverseLookup("other/A1/1/alarm")).toBeUndefined();
    });
  });

  describe("devices", () => {
    it("should list devices sorted by address", () => {
      const registry = createRegistry([smokeEntry("B2"), smokeEntry("A1")]);
      expect(registry.devices().map(d => d.address)).toEqual(["A1", "B2"]);
    });
  });
});

describe("loadInventory", () => {
  const write = (content: string) => {
    const path = join(mkdtempSync(join(tmpdir(), "inventory-")), "inv.json");
    writeFileSync(path, content);
    return path;
  };

  it("should read a valid inventory file", () => {
    const path = write(JSON.stringify([smokeEntry(), handleEntry()]));
    expect(loadInventory(path).flat()).toEqual([smokeEntry(), handleEntry()]);
  });

  it("should fail on malformed JSON", () => {
    expect(loadInventory(write("[{")).isOk()).toBe(false);
  });

  it("should fail on entries without a model", () => {
    const path = write(JSON.stringify([{ address: "A1", channels: 2 }]));
    expect(loadInventory(path).isOk()).toBe(false);
  });

  it("should fail for a missing file", () => {
    expect(loadInventory(join(tmpdir(), "does-not-exist.json")).isOk()).toBe(
      false
    );
  });
});
