import type { Command, CommandHandler, CommandTable, SessionState } from "./types";

/**
 * Common capability of every driver: constructible from an address and a
 * credential, exposing a table of string-typed commands.
 *
 * Subclasses extend the parent table (`{ ...super.commands(), ... }`) so that
 * specializations inherit the operations of the drivers they extend.
 */
export abstract class Device {
  constructor(
    readonly address: string,
    readonly credential: string
  ) {}

  abstract commands(): CommandTable;

  /**
   * State that must survive an encode/decode round trip. Open sockets and
   * other live resources do not belong here; reopen them lazily instead.
   */
  snapshot(): SessionState {
    return {};
  }

  restore(_state: SessionState): void {}

  /** Releases live resources. The device may reopen them if it is used again. */
  async dispose(): Promise<void> {}

  get typeName(): string {
    const declared: unknown = Reflect.get(this.constructor, "typeName");
    return typeof declared === "string" ? declared : this.constructor.name;
  }

  toString(): string {
    return `<${this.typeName} at ${this.address}>`;
  }
}

export interface DriverClass<D extends Device = Device> {
  new (address: string, credential: string): D;
  readonly typeName: string;
}

export function command(run: CommandHandler): Command;
export function command(params: readonly string[], run: CommandHandler): Command;
export function command(paramsOrRun: readonly string[] | CommandHandler, run?: CommandHandler): Command {
  if (typeof paramsOrRun === "function") {
    return { run: paramsOrRun };
  }
  if (!run) {
    throw new TypeError("command() requires a handler");
  }
  return { params: [...paramsOrRun], run };
}

/**
 * A driver class extends Device (directly or through other drivers) and
 * declares its own static `typeName`. Intermediate classes that inherit
 * their parent's name are not drivers in their own right.
 */
export function isDriverClass(value: unknown): value is DriverClass {
  if (typeof value !== "function") return false;
  if (!(value.prototype instanceof Device)) return false;
  if (!Object.prototype.hasOwnProperty.call(value, "typeName")) return false;
  return typeof Reflect.get(value, "typeName") === "string";
}
