import { z } from "zod";

export const DEFAULT_PLUGINS = ["@devbridge/driver-fake", "@devbridge/driver-tcp-line"];

export const BridgeConfigSchema = z.object({
  plugins: z.array(z.string().min(1)).default(DEFAULT_PLUGINS),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  invokeTimeoutMs: z.number().int().positive().optional()
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

/**
 * Reads DEVICE_BRIDGE_PLUGINS (comma-separated module specifiers),
 * DEVICE_BRIDGE_LOG_LEVEL and DEVICE_BRIDGE_INVOKE_TIMEOUT_MS.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const plugins = env.DEVICE_BRIDGE_PLUGINS?.split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  const timeout = env.DEVICE_BRIDGE_INVOKE_TIMEOUT_MS?.trim();

  return BridgeConfigSchema.parse({
    plugins,
    logLevel: env.DEVICE_BRIDGE_LOG_LEVEL?.trim() || undefined,
    invokeTimeoutMs: timeout ? Number(timeout) : undefined
  });
}
