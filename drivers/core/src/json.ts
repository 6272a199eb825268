import { z } from "zod";
import type { JsonValue, SessionState } from "./types";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema)
  ])
);

export const SessionStateSchema: z.ZodType<SessionState> = z.record(z.string(), JsonValueSchema);
