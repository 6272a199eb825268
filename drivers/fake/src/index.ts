export { LampDriver, ColorLampDriver } from "./lamp";
export type { LampStatus } from "./lamp";
export { SwitchDriver } from "./switch";
export { FakeThermometer } from "./thermometer";
