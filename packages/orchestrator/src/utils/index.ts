export { raceWithSignal, throwIfCancelled } from "./cancellation.js";
export { KeyedLock } from "./keyed-lock.js";
