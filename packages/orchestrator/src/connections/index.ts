export {
  ConnectionRegistry,
  type ClientConnection,
  type BroadcastResult,
  type ConnectionRegistryOptions,
} from "./connection-registry.js";
