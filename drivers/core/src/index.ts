export { Device, command, isDriverClass } from "./device";
export type { DriverClass } from "./device";
export { JsonValueSchema, SessionStateSchema } from "./json";
export type { Command, CommandHandler, CommandTable, JsonValue, SessionState } from "./types";
