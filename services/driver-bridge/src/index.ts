export { DeviceBridge } from "./core/bridge";
export type { AppliedMethod, DeviceBridgeOptions } from "./core/bridge";
export { DriverRegistry } from "./core/registry";
export type { DriverDescriptor, PluginSource } from "./core/registry";
export { DriverFactory } from "./core/factory";
export { HandleCodec } from "./core/codec";
export type { DeviceHandle } from "./core/codec";
export { MethodCatalog, formatSignature, NO_SIGNATURE_TEXT, SIGNATURE_UNAVAILABLE } from "./core/catalog";
export type { MethodSignature } from "./core/catalog";
export { Invoker, formatInvocationError, formatResult } from "./core/invoker";
export type { InvokerOptions } from "./core/invoker";
export {
  DeviceRecordSchema,
  fromRecordHandle,
  loadDeviceRecord,
  saveDeviceRecord,
  toRecordHandle
} from "./core/record";
export type { DeviceRecord } from "./core/record";
export {
  DeviceRecordError,
  DeviceTypeNotFoundError,
  DuplicateDriverError,
  HandleDecodeError,
  InvocationError,
  MethodNotAvailableError
} from "./core/errors";
export { BridgeConfigSchema, DEFAULT_PLUGINS, loadBridgeConfig } from "./config";
export type { BridgeConfig } from "./config";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LoggerOptions, LogLevel } from "./logger";
