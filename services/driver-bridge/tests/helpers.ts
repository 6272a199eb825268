import { createLogger, type Logger } from "../src/logger";

export interface CapturedLogs {
  logger: Logger;
  lines: Array<Record<string, unknown>>;
}

export function captureLogs(): CapturedLogs {
  const lines: Array<Record<string, unknown>> = [];
  const logger = createLogger({
    level: "debug",
    destination: {
      write: (msg: string) => {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      }
    }
  });
  return { logger, lines };
}

export const homePlugin = () => import("./fixtures/home-plugin");
export const probePlugin = () => import("./fixtures/probe-plugin");
export const leafPlugin = () => import("./fixtures/leaf-plugin");
export const brokenPlugin = () => import("./fixtures/broken-plugin");
export const rivalPlugin = () => import("./fixtures/rival-plugin");
export const fakePlugin = () => import("@devbridge/driver-fake");
export const tcpLinePlugin = () => import("@devbridge/driver-tcp-line");
