/**
 * @valpool/bridge-client — cross-layer messenger client abstraction.
 *
 * The pool relayer forwards reward notifications through BridgeClient.
 * Swap HttpBridgeClient for MockBridgeClient in tests.
 */

export type {
  BridgeClient,
  BridgeMessage,
  BridgeMessageStatus,
  BridgeReceipt,
  HttpBridgeClientOptions,
} from "./types.js";

export { HttpBridgeClient } from "./http-client.js";
export { MockBridgeClient } from "./mock-client.js";
