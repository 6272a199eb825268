export class DeviceTypeNotFoundError extends Error {
  constructor(readonly typeName: string) {
    super(`Device type '${typeName}' not found`);
    this.name = "DeviceTypeNotFoundError";
  }
}

export class DuplicateDriverError extends Error {
  constructor(readonly typeName: string) {
    super(`Device type '${typeName}' is already registered by another driver`);
    this.name = "DuplicateDriverError";
  }
}

export class HandleDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HandleDecodeError";
  }
}

export class MethodNotAvailableError extends Error {
  constructor(
    readonly methodName: string,
    readonly typeName: string
  ) {
    super(`Method '${methodName}' not found on device ${typeName}`);
    this.name = "MethodNotAvailableError";
  }
}

export class InvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvocationError";
  }
}

export class DeviceRecordError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceRecordError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
