import { isDriverClass } from "@devbridge/driver-core";
import type { DriverClass } from "@devbridge/driver-core";
import { silentLogger, type Logger } from "../logger";
import { DuplicateDriverError } from "./errors";

/** A module specifier for dynamic import, or a loader resolving to a module. */
export type PluginSource = string | (() => Promise<unknown>);

export interface DriverDescriptor {
  readonly name: string;
  readonly driver: DriverClass;
}

interface RegistryDependencies {
  plugins?: PluginSource[];
  logger?: Logger;
  importModule?: (specifier: string) => Promise<unknown>;
}

const importModule = (specifier: string): Promise<unknown> => import(specifier);

/**
 * A driver class followed by every driver class it extends, nearest first.
 * Intermediate classes without their own typeName are passed over.
 */
function lineage(driver: DriverClass): DriverClass[] {
  const chain: DriverClass[] = [];
  for (let current: unknown = driver; typeof current === "function"; current = Object.getPrototypeOf(current)) {
    if (isDriverClass(current)) chain.push(current);
  }
  return chain;
}

/**
 * Every exported driver class, every driver class inside an exported array,
 * and every driver class they extend.
 */
function collectDrivers(loaded: unknown): DriverClass[] {
  if (typeof loaded !== "object" || loaded === null) return [];

  const found: DriverClass[] = [];
  const visit = (value: unknown): void => {
    if (!isDriverClass(value)) return;
    for (const driver of lineage(value)) {
      if (!found.includes(driver)) found.push(driver);
    }
  };

  for (const exported of Object.values(loaded)) {
    if (Array.isArray(exported)) {
      exported.forEach(visit);
    } else {
      visit(exported);
    }
  }
  return found;
}

function pluginLabel(source: PluginSource, index: number): string {
  return typeof source === "string" ? source : `loader#${String(index)}`;
}

export class DriverRegistry {
  private readonly explicit = new Map<string, DriverClass>();
  private table = new Map<string, DriverClass>();
  private readonly logger: Logger;

  constructor(private readonly deps: RegistryDependencies = {}) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Registers a driver directly, together with the driver classes it extends.
   * A different class claiming a name that is already taken is rejected and
   * nothing is registered; registering the same class again is a no-op.
   */
  register(driver: DriverClass): void {
    if (!isDriverClass(driver)) {
      throw new TypeError("Drivers must extend Device and declare their own static typeName");
    }
    const chain = lineage(driver);
    for (const candidate of chain) {
      const existing = this.explicit.get(candidate.typeName) ?? this.table.get(candidate.typeName);
      if (existing && existing !== candidate) {
        throw new DuplicateDriverError(candidate.typeName);
      }
    }
    for (const candidate of chain) {
      this.explicit.set(candidate.typeName, candidate);
      this.table.set(candidate.typeName, candidate);
    }
  }

  /**
   * Loads every plugin and rebuilds the driver table: explicit registrations
   * first, then plugins in configuration order. Plugins that fail to load are
   * skipped. Never rejects.
   */
  async discover(): Promise<DriverDescriptor[]> {
    const table = new Map(this.explicit);
    const plugins = this.deps.plugins ?? [];

    for (const [index, source] of plugins.entries()) {
      const plugin = pluginLabel(source, index);
      const loaded = await this.load(source, plugin);
      for (const driver of collectDrivers(loaded)) {
        this.claim(table, driver, plugin);
      }
    }

    this.table = table;
    return this.descriptors();
  }

  async listTypeNames(): Promise<string[]> {
    const descriptors = await this.discover();
    return descriptors.map((descriptor) => descriptor.name);
  }

  /** Exact, case-sensitive lookup against a fresh discovery pass. */
  async resolve(name: string): Promise<DriverDescriptor | undefined> {
    await this.discover();
    const driver = this.table.get(name);
    return driver ? Object.freeze({ name, driver }) : undefined;
  }

  private descriptors(): DriverDescriptor[] {
    return Array.from(this.table.entries())
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, driver]) => Object.freeze({ name, driver }));
  }

  private async load(source: PluginSource, plugin: string): Promise<unknown> {
    try {
      return typeof source === "string" ? await (this.deps.importModule ?? importModule)(source) : await source();
    } catch (error) {
      this.logger.debug({ plugin, err: error }, "driver plugin failed to load; skipping");
      return undefined;
    }
  }

  private claim(table: Map<string, DriverClass>, driver: DriverClass, plugin: string): void {
    const existing = table.get(driver.typeName);
    if (existing === driver) return;
    if (existing) {
      const error = new DuplicateDriverError(driver.typeName);
      this.logger.warn({ plugin, typeName: driver.typeName }, error.message);
      return;
    }
    table.set(driver.typeName, driver);
  }
}
