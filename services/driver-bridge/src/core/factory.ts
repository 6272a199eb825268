import type { Device } from "@devbridge/driver-core";
import { DeviceTypeNotFoundError } from "./errors";
import type { DriverRegistry } from "./registry";

export class DriverFactory {
  constructor(private readonly registry: DriverRegistry) {}

  /**
   * Builds a device of the exactly named type. Whatever the driver's
   * constructor does (or throws) is the driver's business.
   */
  async create(address: string, credential: string, typeName: string): Promise<Device> {
    const descriptor = await this.registry.resolve(typeName);
    if (!descriptor) {
      throw new DeviceTypeNotFoundError(typeName);
    }
    return new descriptor.driver(address, credential);
  }
}
