import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { DeviceHandle } from "./codec";
import { DeviceRecordError, describeError } from "./errors";

/** What a caller keeps about a created device: its handle plus the catalog taken at creation. */
export const DeviceRecordSchema = z.object({
  deviceType: z.string().min(1),
  address: z.string(),
  credential: z.string(),
  handle: z.string().min(1),
  methods: z.record(z.string(), z.string())
});

export type DeviceRecord = z.infer<typeof DeviceRecordSchema>;

export function toRecordHandle(handle: DeviceHandle): string {
  return Buffer.from(handle).toString("base64");
}

export function fromRecordHandle(record: DeviceRecord): DeviceHandle {
  return Buffer.from(record.handle, "base64");
}

export async function saveDeviceRecord(record: DeviceRecord, filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, "utf8");
}

export async function loadDeviceRecord(filePath: string): Promise<DeviceRecord> {
  const text = await readFile(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new DeviceRecordError(`Device record ${filePath} is not valid JSON: ${describeError(error)}`, {
      cause: error
    });
  }

  const parsed = DeviceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new DeviceRecordError(`Device record ${filePath} is invalid (${issues.join("; ")})`, {
      cause: parsed.error
    });
  }
  return parsed.data;
}
