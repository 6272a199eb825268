import { describe, expect, it } from "vitest";
import { Device } from "@devbridge/driver-core";
import type { CommandTable } from "@devbridge/driver-core";
import { LampDriver } from "@devbridge/driver-fake";
import { DriverRegistry } from "../src/core/registry";
import { DuplicateDriverError } from "../src/core/errors";
import { BaseProbe, LeafProbe, MidProbe } from "./fixtures/probe-plugin";
import { RivalLamp } from "./fixtures/rival-plugin";
import { brokenPlugin, captureLogs, fakePlugin, homePlugin, leafPlugin, probePlugin, rivalPlugin } from "./helpers";

describe("DriverRegistry", () => {
  it("discovers the drivers a plugin exports", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin] });
    await expect(registry.listTypeNames()).resolves.toEqual(["LampDriver", "SwitchDriver"]);
  });

  it("includes every level of specialization exactly once", async () => {
    const registry = new DriverRegistry({ plugins: [probePlugin] });
    const descriptors = await registry.discover();
    expect(descriptors.map((d) => d.name)).toEqual(["BaseProbe", "EchoProbe", "LeafProbe"]);
  });

  it("finds named ancestors above classes that declare no type name", async () => {
    const registry = new DriverRegistry({ plugins: [leafPlugin] });
    const descriptors = await registry.discover();
    expect(descriptors.map((d) => d.name)).toEqual(["BaseProbe", "LeafProbe"]);
    expect(descriptors[0].driver).toBe(BaseProbe);
  });

  it("collapses the same class seen through several plugins", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin, homePlugin, fakePlugin] });
    const descriptors = await registry.discover();
    expect(descriptors.map((d) => d.name)).toEqual(["ColorLampDriver", "FakeThermometer", "LampDriver", "SwitchDriver"]);
    expect(descriptors.find((d) => d.name === "LampDriver")?.driver).toBe(LampDriver);
  });

  it("skips plugins that fail to load", async () => {
    const { logger, lines } = captureLogs();
    const registry = new DriverRegistry({
      plugins: [brokenPlugin, homePlugin, "@devbridge/no-such-plugin"],
      logger,
      importModule: async (specifier) => {
        throw new Error(`Cannot find module '${specifier}'`);
      }
    });

    await expect(registry.listTypeNames()).resolves.toEqual(["LampDriver", "SwitchDriver"]);
    const skipped = lines.filter((line) => line.msg === "driver plugin failed to load; skipping");
    expect(skipped.map((line) => line.plugin)).toEqual(["loader#0", "@devbridge/no-such-plugin"]);
    expect(JSON.stringify(skipped[0].err)).toContain("plugin exploded during import");
  });

  it("loads string specifiers through the module importer", async () => {
    const registry = new DriverRegistry({
      plugins: ["home"],
      importModule: (specifier) =>
        specifier === "home" ? homePlugin() : Promise.reject(new Error(`unexpected ${specifier}`))
    });
    await expect(registry.listTypeNames()).resolves.toEqual(["LampDriver", "SwitchDriver"]);
  });

  it("returns the same membership on repeated discovery", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin, probePlugin] });
    const first = await registry.listTypeNames();
    const second = await registry.listTypeNames();
    expect(second).toEqual(first);
    expect(first).toHaveLength(5);
  });

  it("finds nothing without plugins or registrations", async () => {
    await expect(new DriverRegistry().discover()).resolves.toEqual([]);
  });

  it("keeps the first claim to a name and warns about the rival", async () => {
    const { logger, lines } = captureLogs();
    const registry = new DriverRegistry({ plugins: [homePlugin, rivalPlugin], logger });

    const lamp = await registry.resolve("LampDriver");
    expect(lamp?.driver).toBe(LampDriver);
    const warnings = lines.filter((line) => line.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatchObject({
      plugin: "loader#1",
      typeName: "LampDriver",
      msg: "Device type 'LampDriver' is already registered by another driver"
    });
  });

  it("resolves collisions by plugin order", async () => {
    const registry = new DriverRegistry({ plugins: [rivalPlugin, homePlugin] });
    const lamp = await registry.resolve("LampDriver");
    expect(lamp?.driver).toBe(RivalLamp);
  });

  it("rejects explicit registration of a taken name", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin] });
    await registry.discover();
    expect(() => registry.register(RivalLamp)).toThrow(DuplicateDriverError);
    expect(() => registry.register(RivalLamp)).toThrow("Device type 'LampDriver' is already registered by another driver");
    expect(() => registry.register(LampDriver)).not.toThrow();
  });

  it("gives explicit registrations precedence over plugins", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin] });
    registry.register(RivalLamp);
    const lamp = await registry.resolve("LampDriver");
    expect(lamp?.driver).toBe(RivalLamp);
    await expect(registry.listTypeNames()).resolves.toEqual(["LampDriver", "SwitchDriver"]);
  });

  it("registers the driver classes an explicit registration extends", async () => {
    const registry = new DriverRegistry();
    registry.register(LeafProbe);
    await expect(registry.listTypeNames()).resolves.toEqual(["BaseProbe", "LeafProbe"]);
    await expect(registry.resolve("BaseProbe")).resolves.toMatchObject({ driver: BaseProbe });
  });

  it("registers nothing when an ancestor's name is taken", async () => {
    const registry = new DriverRegistry();
    class OtherBase extends Device {
      static readonly typeName: string = "BaseProbe";

      commands(): CommandTable {
        return {};
      }
    }
    registry.register(OtherBase);
    expect(() => registry.register(LeafProbe)).toThrow("Device type 'BaseProbe' is already registered by another driver");
    await expect(registry.listTypeNames()).resolves.toEqual(["BaseProbe"]);
  });

  it("refuses classes that declare no type name of their own", () => {
    const registry = new DriverRegistry();
    expect(() => registry.register(MidProbe)).toThrow(TypeError);
  });

  it("resolves names exactly", async () => {
    const registry = new DriverRegistry({ plugins: [homePlugin] });
    await expect(registry.resolve("LampDriver")).resolves.toMatchObject({ name: "LampDriver" });
    await expect(registry.resolve("lampdriver")).resolves.toBeUndefined();
    await expect(registry.resolve("LampDriver ")).resolves.toBeUndefined();
  });
});
