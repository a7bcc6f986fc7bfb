/**
 * HTTP bridge client tests.
 *
 * Exercises request shape and receipt parsing against a mock fetch.
 */

import { describe, it, expect, vi } from "vitest";
import { HttpBridgeClient } from "../src/http-client.js";
import { MockBridgeClient } from "../src/mock-client.js";
import type { BridgeMessage } from "../src/types.js";

const MESSAGE: BridgeMessage = {
  id: "ab".repeat(32),
  target: "0x" + "42".repeat(20),
  gasLimit: 300_000,
  data: "0xa0",
};

function createMockFetch(status: number, body: string) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => {
    return new Response(body, { status, headers: { "content-type": "application/json" } });
  });
}

describe("HttpBridgeClient", () => {
  it("POSTs the message as snake_case JSON with bearer auth", async () => {
    const fetchFn = createMockFetch(202, JSON.stringify({ id: MESSAGE.id, status: "QUEUED" }));
    const client = new HttpBridgeClient({
      baseUrl: "http://bridge.test/",
      authToken: "test-secret",
      fetchFn,
    });

    const receipt = await client.sendMessage(MESSAGE);
    expect(receipt).toEqual({ id: MESSAGE.id, status: "QUEUED" });

    expect(fetchFn).toHaveBeenCalledOnce();
    const [url, init] = fetchFn.mock.calls[0]!;
    expect(url).toBe("http://bridge.test/messages");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-secret",
      "Content-Type": "application/json",
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      id: MESSAGE.id,
      target: MESSAGE.target,
      gas_limit: 300_000,
      data: "0xa0",
    });
  });

  it("reads message status including tx hash", async () => {
    const txHash = "0x" + "cd".repeat(32);
    const fetchFn = createMockFetch(
      200,
      JSON.stringify({ id: MESSAGE.id, status: "RELAYED", tx_hash: txHash }),
    );
    const client = new HttpBridgeClient({ baseUrl: "http://bridge.test", fetchFn });

    const receipt = await client.getMessageStatus(MESSAGE.id);
    expect(receipt).toEqual({ id: MESSAGE.id, status: "RELAYED", txHash });
    expect(fetchFn.mock.calls[0]![0]).toBe(`http://bridge.test/messages/${MESSAGE.id}`);
  });

  it("throws with status and body on HTTP errors", async () => {
    const fetchFn = createMockFetch(503, "relay down");
    const client = new HttpBridgeClient({ baseUrl: "http://bridge.test", fetchFn });

    await expect(client.sendMessage(MESSAGE)).rejects.toThrow(
      "Bridge POST /messages: 503 relay down",
    );
  });

  it("throws on malformed receipts", async () => {
    const fetchFn = createMockFetch(200, JSON.stringify({ id: MESSAGE.id, status: "LOST" }));
    const client = new HttpBridgeClient({ baseUrl: "http://bridge.test", fetchFn });

    await expect(client.sendMessage(MESSAGE)).rejects.toThrow("Bridge: malformed receipt");
  });

  it("throws on non-JSON bodies", async () => {
    const fetchFn = createMockFetch(200, "<html>");
    const client = new HttpBridgeClient({ baseUrl: "http://bridge.test", fetchFn });

    await expect(client.sendMessage(MESSAGE)).rejects.toThrow("invalid JSON response");
  });
});

describe("MockBridgeClient", () => {
  it("records messages once per id", async () => {
    const client = new MockBridgeClient();
    await client.sendMessage(MESSAGE);
    await client.sendMessage(MESSAGE);
    expect(client.sent).toHaveLength(1);
    expect((await client.getMessageStatus(MESSAGE.id)).status).toBe("QUEUED");
  });

  it("failNext() makes sends throw", async () => {
    const client = new MockBridgeClient();
    client.failNext();
    await expect(client.sendMessage(MESSAGE)).rejects.toThrow("bridge unavailable");
    await expect(client.sendMessage(MESSAGE)).resolves.toEqual({ id: MESSAGE.id, status: "QUEUED" });
  });
});
