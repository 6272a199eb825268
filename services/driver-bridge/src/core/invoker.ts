import { inspect } from "node:util";
import type { Command, Device } from "@devbridge/driver-core";
import { silentLogger, type Logger } from "../logger";
import { InvocationError, MethodNotAvailableError, describeError } from "./errors";

export interface InvokerOptions {
  /** Folds an invocation that has not settled in time into an error result. */
  timeoutMs?: number;
  logger?: Logger;
}

export function formatInvocationError(methodName: string, error: unknown): string {
  return `Error calling method '${methodName}': ${describeError(error)}`;
}

function lookup(device: Device, methodName: string): Command {
  const table = device.commands();
  const entry = Object.prototype.hasOwnProperty.call(table, methodName) ? table[methodName] : undefined;
  if (!entry || typeof entry.run !== "function") {
    throw new MethodNotAvailableError(methodName, device.typeName);
  }
  return entry;
}

function checkArity(methodName: string, entry: Command, given: number): void {
  const params = entry.params;
  if (!params) return;
  const max = params.length;
  const required = params.filter((param) => !param.endsWith("?")).length;
  if (given >= required && given <= max) return;

  const expected =
    required === max ? `${String(max)} argument${max === 1 ? "" : "s"}` : `${String(required)} to ${String(max)} arguments`;
  throw new InvocationError(`${methodName}() takes ${expected} (${String(given)} given)`);
}

function hasOwnStringForm(value: object): boolean {
  const toString: unknown = Reflect.get(value, "toString");
  return typeof toString === "function" && toString !== Object.prototype.toString && toString !== Array.prototype.toString;
}

function toJsonText(value: object): string {
  try {
    return JSON.stringify(value);
  } catch {
    // BigInt members and cycles have no JSON form.
    return inspect(value);
  }
}

/**
 * Text form of a command's result: strings as they are, objects with their
 * own toString through it, other objects as JSON, everything else via String().
 */
export function formatResult(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) {
    return hasOwnStringForm(value) ? String(value) : toJsonText(value);
  }
  return String(value);
}

/**
 * Runs a named command with string arguments. Never rejects: every failure
 * becomes the result text.
 */
export class Invoker {
  private readonly logger: Logger;

  constructor(private readonly options: InvokerOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  async invoke(device: Device, methodName: string, args: readonly string[]): Promise<string> {
    try {
      const entry = lookup(device, methodName);
      checkArity(methodName, entry, args.length);
      const result = await this.settle(entry.run(...args));
      return formatResult(result);
    } catch (error) {
      this.logger.debug({ method: methodName, err: error }, "device command failed");
      return formatInvocationError(methodName, error);
    }
  }

  private async settle(pending: unknown): Promise<unknown> {
    const { timeoutMs } = this.options;
    if (timeoutMs === undefined) {
      return await pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new InvocationError(`Invocation timed out after ${String(timeoutMs)}ms`));
      }, timeoutMs);
    });
    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
