import { z } from "zod";
import { Device, command } from "@devbridge/driver-core";
import type { CommandTable, SessionState } from "@devbridge/driver-core";
import { clamp } from "./lamp";

const ThermometerStateSchema = z
  .object({
    rngState: z.number().int().nonnegative(),
    elapsedSeconds: z.number().nonnegative(),
    sampleIntervalSeconds: z.number().positive()
  })
  .partial();

/** FNV-1a, so that a given address and credential always seed the same readings. */
function seedFrom(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i += 1) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash === 0 ? 0x1abcdef : hash;
}

/**
 * Simulated temperature probe. The generator state is session state, so a
 * decoded copy continues the same sequence of readings.
 */
export class FakeThermometer extends Device {
  static readonly typeName: string = "FakeThermometer";

  private rngState: number;
  private elapsedSeconds = 0;
  private sampleIntervalSeconds = 2;

  constructor(address: string, credential: string) {
    super(address, credential);
    this.rngState = seedFrom(`${address}/${credential}`);
  }

  commands(): CommandTable {
    return {
      readTemperature: command([], () => this.readTemperature()),
      setSampleInterval: command(["seconds"], (seconds) => this.setSampleInterval(seconds)),
      reset: command([], () => this.reset())
    };
  }

  readTemperature(): number {
    const progress = this.elapsedSeconds / 600;
    const base = 21 + 4 * Math.atan(progress * 3);
    const noise = (this.random() - 0.5) * 2;
    this.elapsedSeconds += this.sampleIntervalSeconds;
    return Number(clamp(base + noise * 0.5, -40, 125).toFixed(2));
  }

  setSampleInterval(seconds: string): number {
    const parsed = Number(seconds);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`seconds must be a positive number, got '${seconds}'`);
    }
    this.sampleIntervalSeconds = parsed;
    return parsed;
  }

  reset(): number {
    this.elapsedSeconds = 0;
    return this.elapsedSeconds;
  }

  snapshot(): SessionState {
    return {
      rngState: this.rngState,
      elapsedSeconds: this.elapsedSeconds,
      sampleIntervalSeconds: this.sampleIntervalSeconds
    };
  }

  restore(state: SessionState): void {
    const parsed = ThermometerStateSchema.parse(state);
    if (parsed.rngState !== undefined) this.rngState = parsed.rngState;
    if (parsed.elapsedSeconds !== undefined) this.elapsedSeconds = parsed.elapsedSeconds;
    if (parsed.sampleIntervalSeconds !== undefined) this.sampleIntervalSeconds = parsed.sampleIntervalSeconds;
  }

  private random(): number {
    this.rngState = (1664525 * this.rngState + 1013904223) >>> 0;
    return this.rngState / 0xffffffff;
  }
}
