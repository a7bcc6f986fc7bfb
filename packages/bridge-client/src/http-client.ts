/**
 * HTTP bridge client — posts messages to the bridge relay API.
 *
 * POST /messages      { id, target, gas_limit, data } → { id, status, tx_hash? }
 * GET  /messages/{id} → { id, status, tx_hash? }
 */

import type {
  BridgeClient,
  BridgeMessage,
  BridgeMessageStatus,
  BridgeReceipt,
  HttpBridgeClientOptions,
} from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpBridgeClient implements BridgeClient {
  private readonly baseUrl: string;
  private readonly authToken: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;

  constructor(opts: HttpBridgeClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.authToken = opts.authToken ?? "";
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = opts.fetchFn ?? fetch;
  }

  async sendMessage(message: BridgeMessage): Promise<BridgeReceipt> {
    const data = await this.request("POST", "/messages", {
      id: message.id,
      target: message.target,
      gas_limit: message.gasLimit,
      data: message.data,
    });
    return parseReceipt(data);
  }

  async getMessageStatus(id: string): Promise<BridgeReceipt> {
    const data = await this.request("GET", `/messages/${encodeURIComponent(id)}`);
    return parseReceipt(data);
  }

  /** Generic JSON request helper. */
  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const res = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers: {
        ...(this.authToken ? { Authorization: `Bearer ${this.authToken}` } : {}),
        ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await res.text();
    if (!res.ok) {
      throw new Error(`Bridge ${method} ${path}: ${String(res.status)} ${text}`);
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new Error(`Bridge ${method} ${path}: invalid JSON response`);
    }
  }
}

const STATUSES: readonly BridgeMessageStatus[] = ["QUEUED", "RELAYED", "FAILED"];

function isStatus(value: unknown): value is BridgeMessageStatus {
  return STATUSES.some((s) => s === value);
}

function parseReceipt(data: unknown): BridgeReceipt {
  if (typeof data !== "object" || data === null) {
    throw new Error("Bridge: malformed receipt");
  }
  const id: unknown = Reflect.get(data, "id");
  const status: unknown = Reflect.get(data, "status");
  const txHash: unknown = Reflect.get(data, "tx_hash");
  if (typeof id !== "string" || !isStatus(status)) {
    throw new Error("Bridge: malformed receipt");
  }
  return {
    id,
    status,
    ...(typeof txHash === "string" ? { txHash } : {}),
  };
}
