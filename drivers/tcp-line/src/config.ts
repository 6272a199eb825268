import { z } from "zod";
import { TcpLineError } from "./errors";

export const TcpLineConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().positive().max(65535),
  requestTimeoutMs: z.number().int().positive().default(2000),
  reconnect: z
    .object({
      minBackoffMs: z.number().int().nonnegative().default(250),
      maxBackoffMs: z.number().int().nonnegative().default(5000)
    })
    .default({ minBackoffMs: 250, maxBackoffMs: 5000 })
});

export type TcpLineConfig = z.infer<typeof TcpLineConfigSchema>;

/**
 * Parses `host:port`, optionally followed by `?requestTimeoutMs=…&minBackoffMs=…&maxBackoffMs=…`.
 */
export function parseTcpLineAddress(address: string): TcpLineConfig {
  let url: URL;
  try {
    url = new URL(`tcp://${address}`);
  } catch (error) {
    throw new TcpLineError(`Invalid device address '${address}'`, { cause: error });
  }

  const numberParam = (key: string): number | undefined => {
    const raw = url.searchParams.get(key);
    return raw === null ? undefined : Number(raw);
  };

  const parsed = TcpLineConfigSchema.safeParse({
    host: url.hostname.replace(/^\[(.*)\]$/, "$1"),
    port: url.port ? Number(url.port) : undefined,
    requestTimeoutMs: numberParam("requestTimeoutMs"),
    reconnect: {
      minBackoffMs: numberParam("minBackoffMs"),
      maxBackoffMs: numberParam("maxBackoffMs")
    }
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new TcpLineError(`Invalid device address '${address}' (${issues.join("; ")})`);
  }
  return parsed.data;
}
