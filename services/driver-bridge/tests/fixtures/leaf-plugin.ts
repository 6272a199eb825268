/** Exports only the most specialized probe; its ancestors come from the prototype chain. */
export { LeafProbe } from "./probe-plugin";
