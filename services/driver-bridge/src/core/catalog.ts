import type { Command, Device } from "@devbridge/driver-core";

export const SIGNATURE_UNAVAILABLE = "unavailable";
export const NO_SIGNATURE_TEXT = "No signature available";
const PRIVATE_PREFIX = "_";

export type MethodSignature =
  | { readonly name: string; readonly params: readonly string[] }
  | { readonly name: string; readonly params: typeof SIGNATURE_UNAVAILABLE };

function signatureOf(name: string, entry: Command): MethodSignature {
  const params: unknown = entry.params;
  if (Array.isArray(params) && params.every((param): param is string => typeof param === "string")) {
    return { name, params: [...params] };
  }
  return { name, params: SIGNATURE_UNAVAILABLE };
}

export function formatSignature(signature: MethodSignature): string {
  if (signature.params === SIGNATURE_UNAVAILABLE) {
    return NO_SIGNATURE_TEXT;
  }
  return `(${signature.params.join(", ")})`;
}

/**
 * Public operations of a device, computed from its command table on every
 * call. Names starting with `_` are private to the driver.
 */
export class MethodCatalog {
  describe(device: Device): Record<string, MethodSignature> {
    const described: Record<string, MethodSignature> = {};
    const entries = Object.entries(device.commands()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [name, entry] of entries) {
      if (name.startsWith(PRIVATE_PREFIX)) continue;
      if (typeof entry.run !== "function") continue;
      described[name] = signatureOf(name, entry);
    }
    return described;
  }

  /** Name to signature text, e.g. `{ setColorTemperature: "(value)" }`. */
  describeText(device: Device): Record<string, string> {
    const described = this.describe(device);
    return Object.fromEntries(
      Object.entries(described).map(([name, signature]) => [name, formatSignature(signature)])
    );
  }
}
