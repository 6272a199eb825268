import { command } from "@devbridge/driver-core";
import type { CommandTable } from "@devbridge/driver-core";
import { TcpLineDevice } from "./driver";
import { TcpLineError } from "./errors";

/** Network lamp: power and colour temperature on top of the raw line protocol. */
export class TcpLampDevice extends TcpLineDevice {
  static readonly typeName: string = "TcpLampDevice";

  commands(): CommandTable {
    return {
      ...super.commands(),
      turnOn: command([], () => this.send("set_power", ["on"])),
      turnOff: command([], () => this.send("set_power", ["off"])),
      setColorTemperature: command(["value", "durationMs?"], (value, durationMs) =>
        this.setColorTemperature(value, durationMs)
      )
    };
  }

  async setColorTemperature(value: string, durationMs?: string): Promise<unknown> {
    const kelvin = Number(value);
    if (!Number.isInteger(kelvin)) {
      throw new TcpLineError(`value must be an integer, got '${value}'`);
    }
    const duration = durationMs === undefined ? 500 : Number(durationMs);
    if (!Number.isInteger(duration) || duration < 0) {
      throw new TcpLineError(`durationMs must be a non-negative integer, got '${durationMs ?? ""}'`);
    }
    return this.send("set_ct_abx", [kelvin, "smooth", duration]);
  }
}
