import { z } from "zod";
import { Device, command } from "@devbridge/driver-core";
import type { CommandTable, SessionState } from "@devbridge/driver-core";

const MIN_KELVIN = 1700;
const MAX_KELVIN = 6500;

const LampStateSchema = z
  .object({
    power: z.boolean(),
    colorTemperature: z.number().int().min(MIN_KELVIN).max(MAX_KELVIN)
  })
  .partial();

const RgbStateSchema = z
  .object({
    rgb: z.tuple([z.number().int(), z.number().int(), z.number().int()])
  })
  .partial();

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function parseInteger(label: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new Error(`${label} must be an integer, got '${value}'`);
  }
  return parsed;
}

export interface LampStatus {
  power: "on" | "off";
  colorTemperature: number;
}

export class LampDriver extends Device {
  static readonly typeName: string = "LampDriver";

  protected power = false;
  protected colorTemperature = 4000;

  commands(): CommandTable {
    return {
      turnOn: command([], () => this.turnOn()),
      turnOff: command([], () => this.turnOff()),
      setColorTemperature: command(["value"], (value) => this.setColorTemperature(value)),
      status: command([], () => this.status())
    };
  }

  turnOn(): string {
    this.power = true;
    return "on";
  }

  turnOff(): string {
    this.power = false;
    return "off";
  }

  /** Kelvin, clamped to what the lamp supports. */
  setColorTemperature(value: string): string {
    this.colorTemperature = clamp(parseInteger("value", value), MIN_KELVIN, MAX_KELVIN);
    return String(this.colorTemperature);
  }

  status(): LampStatus {
    return {
      power: this.power ? "on" : "off",
      colorTemperature: this.colorTemperature
    };
  }

  snapshot(): SessionState {
    return { power: this.power, colorTemperature: this.colorTemperature };
  }

  restore(state: SessionState): void {
    const parsed = LampStateSchema.parse(state);
    if (parsed.power !== undefined) this.power = parsed.power;
    if (parsed.colorTemperature !== undefined) this.colorTemperature = parsed.colorTemperature;
  }
}

export class ColorLampDriver extends LampDriver {
  static readonly typeName: string = "ColorLampDriver";

  private rgb: [number, number, number] = [255, 255, 255];

  commands(): CommandTable {
    return {
      ...super.commands(),
      setRgb: command(["red", "green", "blue"], (red, green, blue) => this.setRgb(red, green, blue))
    };
  }

  setRgb(red: string, green: string, blue: string): string {
    this.rgb = [
      clamp(parseInteger("red", red), 0, 255),
      clamp(parseInteger("green", green), 0, 255),
      clamp(parseInteger("blue", blue), 0, 255)
    ];
    return `#${this.rgb.map((channel) => channel.toString(16).padStart(2, "0")).join("")}`;
  }

  snapshot(): SessionState {
    return { ...super.snapshot(), rgb: [...this.rgb] };
  }

  restore(state: SessionState): void {
    super.restore(state);
    const parsed = RgbStateSchema.parse(state);
    if (parsed.rgb) this.rgb = parsed.rgb;
  }
}
