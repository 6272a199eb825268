import { Device, command } from "@devbridge/driver-core";
import type { CommandTable, SessionState } from "@devbridge/driver-core";

export class SwitchDriver extends Device {
  static readonly typeName: string = "SwitchDriver";

  private on = false;

  commands(): CommandTable {
    return {
      toggle: command([], () => this.toggle()),
      isOn: command([], () => this.on)
    };
  }

  toggle(): string {
    this.on = !this.on;
    return this.on ? "on" : "off";
  }

  snapshot(): SessionState {
    return { on: this.on };
  }

  restore(state: SessionState): void {
    if (typeof state.on === "boolean") {
      this.on = state.on;
    }
  }
}
