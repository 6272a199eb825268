export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Declared-serializable session fields of a device, beyond address and credential. */
export type SessionState = Record<string, JsonValue>;

export type CommandHandler = (...args: string[]) => unknown;

export interface Command {
  /**
   * Positional parameter names. A trailing `?` marks an optional parameter.
   * Left undefined when the handler takes arguments the driver does not declare.
   */
  readonly params?: readonly string[];
  readonly run: CommandHandler;
}

export type CommandTable = Readonly<Record<string, Command>>;
