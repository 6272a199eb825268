import { describe, expect, it } from "vitest";
import { ColorLampDriver, LampDriver } from "../src/lamp";
import { SwitchDriver } from "../src/switch";
import { FakeThermometer } from "../src/thermometer";

describe("LampDriver", () => {
  it("clamps colour temperature and reports status", () => {
    const lamp = new LampDriver("10.0.0.5", "test-token");
    expect(lamp.turnOn()).toBe("on");
    expect(lamp.setColorTemperature("2700")).toBe("2700");
    expect(lamp.setColorTemperature("9000")).toBe("6500");
    expect(lamp.status()).toEqual({ power: "on", colorTemperature: 6500 });
  });

  it("rejects non-integer temperatures", () => {
    const lamp = new LampDriver("10.0.0.5", "test-token");
    expect(() => lamp.setColorTemperature("warm")).toThrow("value must be an integer, got 'warm'");
  });

  it("restores state from a snapshot", () => {
    const lamp = new LampDriver("10.0.0.5", "test-token");
    lamp.turnOn();
    lamp.setColorTemperature("3000");

    const copy = new LampDriver("10.0.0.5", "test-token");
    copy.restore(lamp.snapshot());
    expect(copy.status()).toEqual({ power: "on", colorTemperature: 3000 });
  });

  it("refuses out-of-range state", () => {
    const lamp = new LampDriver("10.0.0.5", "test-token");
    expect(() => lamp.restore({ colorTemperature: 12 })).toThrow();
  });
});

describe("ColorLampDriver", () => {
  it("inherits lamp commands and adds setRgb", () => {
    const lamp = new ColorLampDriver("10.0.0.6", "test-token");
    expect(Object.keys(lamp.commands()).sort()).toEqual([
      "setColorTemperature",
      "setRgb",
      "status",
      "turnOff",
      "turnOn"
    ]);
    expect(lamp.setRgb("255", "128", "300")).toBe("#ff80ff");
  });

  it("snapshots parent and own state together", () => {
    const lamp = new ColorLampDriver("10.0.0.6", "test-token");
    lamp.turnOn();
    lamp.setRgb("1", "2", "3");
    expect(lamp.snapshot()).toEqual({ power: true, colorTemperature: 4000, rgb: [1, 2, 3] });
  });
});

describe("SwitchDriver", () => {
  it("toggles", () => {
    const sw = new SwitchDriver("10.0.0.7", "test-token");
    expect(sw.toggle()).toBe("on");
    expect(sw.toggle()).toBe("off");
    expect(sw.snapshot()).toEqual({ on: false });
  });
});

describe("FakeThermometer", () => {
  it("produces the same readings for the same address and credential", () => {
    const a = new FakeThermometer("10.0.0.8", "test-token");
    const b = new FakeThermometer("10.0.0.8", "test-token");
    expect(a.readTemperature()).toBe(b.readTemperature());
    expect(a.readTemperature()).toBe(b.readTemperature());
  });

  it("continues the sequence after restore", () => {
    const original = new FakeThermometer("10.0.0.8", "test-token");
    original.readTemperature();
    const copy = new FakeThermometer("10.0.0.8", "test-token");
    copy.restore(original.snapshot());
    expect(copy.readTemperature()).toBe(original.readTemperature());
  });

  it("stays within plausible bounds", () => {
    const probe = new FakeThermometer("10.0.0.9", "test-token");
    const reading = probe.readTemperature();
    expect(reading).toBeGreaterThan(19);
    expect(reading).toBeLessThan(28);
  });

  it("rejects a non-positive sample interval", () => {
    const probe = new FakeThermometer("10.0.0.9", "test-token");
    expect(() => probe.setSampleInterval("0")).toThrow("seconds must be a positive number, got '0'");
  });
});
