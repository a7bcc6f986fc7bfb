/**
 * Mock bridge client for testing.
 *
 * Records every message. Use failNext() to simulate an unavailable bridge.
 */

import type { BridgeClient, BridgeMessage, BridgeReceipt } from "./types.js";

export class MockBridgeClient implements BridgeClient {
  readonly sent: BridgeMessage[] = [];
  private failures = 0;

  async sendMessage(message: BridgeMessage): Promise<BridgeReceipt> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error("MockBridgeClient: bridge unavailable");
    }
    // Bridge dedupes on id
    if (!this.sent.some((m) => m.id === message.id)) {
      this.sent.push(message);
    }
    return { id: message.id, status: "QUEUED" };
  }

  async getMessageStatus(id: string): Promise<BridgeReceipt> {
    const known = this.sent.some((m) => m.id === id);
    return { id, status: known ? "QUEUED" : "FAILED" };
  }

  /** Test helper: make the next `count` sends throw. */
  failNext(count = 1): void {
    this.failures += count;
  }
}
