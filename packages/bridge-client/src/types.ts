/**
 * Bridge client interface — abstraction over the L1→L2 messenger.
 *
 * The pool's relayer calls sendMessage() for every queued reward
 * notification. Wire behind this interface so tests can swap in the mock.
 */

export interface BridgeMessage {
  /** Message id (hex SHA-256 of the payload); the bridge dedupes on it. */
  id: string;
  /** L2 contract that receives the call. */
  target: string;
  /** Gas budget for executing the call on L2. */
  gasLimit: number;
  /** 0x-prefixed hex call data. */
  data: string;
}

export type BridgeMessageStatus = "QUEUED" | "RELAYED" | "FAILED";

export interface BridgeReceipt {
  id: string;
  status: BridgeMessageStatus;
  /** L1 transaction that carried the message, once known. */
  txHash?: string;
}

export interface BridgeClient {
  sendMessage(message: BridgeMessage): Promise<BridgeReceipt>;
  getMessageStatus(id: string): Promise<BridgeReceipt>;
}

export interface HttpBridgeClientOptions {
  /** Bridge relay API base URL (e.g. "http://localhost:3200"). */
  baseUrl: string;
  /** Bearer token. Empty = no auth (devnet only). */
  authToken?: string;
  /** Per-request timeout in ms. */
  timeoutMs?: number;
  /** Injectable fetch (tests). */
  fetchFn?: typeof fetch;
}
