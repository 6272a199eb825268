import { z } from "zod";
import { JsonValueSchema } from "@devbridge/driver-core";
import type { JsonValue } from "@devbridge/driver-core";

export interface TcpLineRequest {
  id: number;
  method: string;
  params: JsonValue[];
  token: string;
}

const ErrorReplySchema = z.object({
  id: z.number().int(),
  error: z.object({
    message: z.string(),
    code: z.number().optional()
  })
});

const ResultReplySchema = z.object({
  id: z.number().int(),
  result: JsonValueSchema.optional()
});

const ReplySchema = z.union([ErrorReplySchema, ResultReplySchema]);

export type TcpLineReply = z.infer<typeof ReplySchema>;

export function parseReply(line: string): TcpLineReply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    throw new Error("invalid json");
  }
  const result = ReplySchema.safeParse(parsed);
  if (!result.success) {
    throw new Error("not a reply");
  }
  return result.data;
}

/** Accumulates socket chunks and hands out complete, non-empty lines. */
export class LineSplitter {
  private pending = "";

  push(chunk: string): string[] {
    this.pending += chunk;
    const parts = this.pending.split("\n");
    this.pending = parts.pop() ?? "";
    return parts.map((part) => part.trim()).filter((part) => part.length > 0);
  }
}
