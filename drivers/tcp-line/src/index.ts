export { TcpLineDevice } from "./driver";
export { TcpLampDevice } from "./lamp";
export { parseTcpLineAddress, TcpLineConfigSchema } from "./config";
export type { TcpLineConfig } from "./config";
export { TcpLineError } from "./errors";
export type { TcpLineMetrics, TcpLineStatus } from "./metrics";
