import { z } from "zod";
import { SessionStateSchema } from "@devbridge/driver-core";
import type { Device } from "@devbridge/driver-core";
import { HandleDecodeError, describeError } from "./errors";
import type { DriverRegistry } from "./registry";

/** Opaque bytes. Only this codec reads or writes them. */
export type DeviceHandle = Uint8Array;

const HandleEnvelopeSchema = z.object({
  format: z.literal("device-handle"),
  version: z.literal(1),
  type: z.string().min(1),
  address: z.string(),
  credential: z.string(),
  state: SessionStateSchema
});

type HandleEnvelope = z.infer<typeof HandleEnvelopeSchema>;

/**
 * Encodes a device as its type name, connection parameters and declared
 * session state. Decoding re-runs the driver's constructor and restores the
 * state; live resources are never part of a handle.
 */
export class HandleCodec {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(private readonly registry: DriverRegistry) {}

  encode(device: Device): DeviceHandle {
    const envelope: HandleEnvelope = {
      format: "device-handle",
      version: 1,
      type: device.typeName,
      address: device.address,
      credential: device.credential,
      state: device.snapshot()
    };
    return Buffer.from(JSON.stringify(envelope), "utf8");
  }

  async decode(handle: DeviceHandle): Promise<Device> {
    const envelope = this.parse(handle);
    const descriptor = await this.registry.resolve(envelope.type);
    if (!descriptor) {
      throw new HandleDecodeError(`Handle references unknown device type '${envelope.type}'`);
    }

    try {
      const device = new descriptor.driver(envelope.address, envelope.credential);
      device.restore(envelope.state);
      return device;
    } catch (error) {
      throw new HandleDecodeError(`Cannot rebuild ${envelope.type} from handle: ${describeError(error)}`, {
        cause: error
      });
    }
  }

  private parse(handle: DeviceHandle): HandleEnvelope {
    let raw: unknown;
    try {
      raw = JSON.parse(this.decoder.decode(handle));
    } catch (error) {
      throw new HandleDecodeError("Handle is not valid device handle data", { cause: error });
    }

    const parsed = HandleEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new HandleDecodeError("Handle is malformed", { cause: parsed.error });
    }
    return parsed.data;
  }
}
