import type { Device } from "@devbridge/driver-core";
import type { BridgeConfig } from "../config";
import { createLogger, silentLogger, type Logger } from "../logger";
import { MethodCatalog } from "./catalog";
import { HandleCodec, type DeviceHandle } from "./codec";
import { DriverFactory } from "./factory";
import { Invoker, formatInvocationError } from "./invoker";
import { fromRecordHandle, toRecordHandle, type DeviceRecord } from "./record";
import { DriverRegistry, type PluginSource } from "./registry";

export interface DeviceBridgeOptions {
  registry?: DriverRegistry;
  plugins?: PluginSource[];
  logger?: Logger;
  invokeTimeoutMs?: number;
}

export interface AppliedMethod {
  result: string;
  /** The device's state after the call; the input handle when the call never reached the device. */
  handle: DeviceHandle;
}

/**
 * Operates any registered driver by name: devices travel as opaque handles
 * and are rebuilt for every operation.
 */
export class DeviceBridge {
  readonly registry: DriverRegistry;
  private readonly factory: DriverFactory;
  private readonly codec: HandleCodec;
  private readonly catalog = new MethodCatalog();
  private readonly invoker: Invoker;
  private readonly logger: Logger;

  constructor(options: DeviceBridgeOptions = {}) {
    this.logger = options.logger ?? silentLogger;
    this.registry = options.registry ?? new DriverRegistry({ plugins: options.plugins, logger: this.logger });
    this.factory = new DriverFactory(this.registry);
    this.codec = new HandleCodec(this.registry);
    this.invoker = new Invoker({ timeoutMs: options.invokeTimeoutMs, logger: this.logger });
  }

  static fromConfig(config: BridgeConfig, logger: Logger = createLogger({ level: config.logLevel })): DeviceBridge {
    return new DeviceBridge({
      plugins: config.plugins,
      invokeTimeoutMs: config.invokeTimeoutMs,
      logger
    });
  }

  listDeviceTypes(): Promise<string[]> {
    return this.registry.listTypeNames();
  }

  /** Rejects with DeviceTypeNotFoundError for unknown type names. */
  async createDevice(address: string, credential: string, typeName: string): Promise<DeviceHandle> {
    const device = await this.factory.create(address, credential, typeName);
    try {
      this.logger.info({ typeName, address }, "device created");
      return this.codec.encode(device);
    } finally {
      await this.release(device);
    }
  }

  /** Rejects with HandleDecodeError for handles that cannot be rebuilt. */
  async describeDevice(handle: DeviceHandle): Promise<Record<string, string>> {
    const device = await this.codec.decode(handle);
    try {
      return this.catalog.describeText(device);
    } finally {
      await this.release(device);
    }
  }

  /** Never rejects; failures, including unusable handles, come back as the result text. */
  async callMethod(handle: DeviceHandle, methodName: string, args: readonly string[] = []): Promise<string> {
    const applied = await this.applyMethod(handle, methodName, args);
    return applied.result;
  }

  /** Like callMethod, but also hands back a handle carrying the state the call left behind. */
  async applyMethod(handle: DeviceHandle, methodName: string, args: readonly string[] = []): Promise<AppliedMethod> {
    let device: Device;
    try {
      device = await this.codec.decode(handle);
    } catch (error) {
      this.logger.debug({ method: methodName, err: error }, "cannot decode device handle");
      return { result: formatInvocationError(methodName, error), handle };
    }

    try {
      const result = await this.invoker.invoke(device, methodName, args);
      try {
        return { result, handle: this.codec.encode(device) };
      } catch (error) {
        this.logger.warn({ method: methodName, err: error }, "cannot encode device state after call");
        return { result, handle };
      }
    } finally {
      await this.release(device);
    }
  }

  async createRecord(address: string, credential: string, typeName: string): Promise<DeviceRecord> {
    const device = await this.factory.create(address, credential, typeName);
    try {
      return {
        deviceType: device.typeName,
        address,
        credential,
        handle: toRecordHandle(this.codec.encode(device)),
        methods: this.catalog.describeText(device)
      };
    } finally {
      await this.release(device);
    }
  }

  callRecord(record: DeviceRecord, methodName: string, args: readonly string[] = []): Promise<string> {
    return this.callMethod(fromRecordHandle(record), methodName, args);
  }

  private async release(device: Device): Promise<void> {
    try {
      await device.dispose();
    } catch (error) {
      this.logger.warn({ typeName: device.typeName, err: error }, "failed to release device resources");
    }
  }
}
