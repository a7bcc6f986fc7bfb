/**
 * Reward relayer — drains the notifier outbox through the bridge.
 *
 * Every `intervalMs` sends queued notifications oldest-first. The first
 * failed send, or a receipt with status FAILED, stops the pass; that
 * message and everything after it stay queued for the next tick.
 */

import type { BridgeClient, BridgeReceipt } from "@valpool/bridge-client";
import type { RewardNotifier } from "./reward-notifier.js";

export interface RelayerOptions {
  /** How often to drain the outbox (ms). Default: 15_000. */
  intervalMs?: number;
  /** Callback per delivered message. */
  onRelay?: (receipt: BridgeReceipt) => void;
  /** Callback for send errors. */
  onError?: (error: unknown, messageId: string) => void;
}

export interface RelayResult {
  relayed: number;
  failed: number;
  remaining: number;
}

export interface RewardRelayer {
  start(): void;
  stop(): void;
  /** Run one pass now (also used by tests). */
  tick(): Promise<RelayResult>;
}

const DEFAULT_INTERVAL_MS = 15_000;

export function createRewardRelayer(
  notifier: RewardNotifier,
  client: BridgeClient,
  options: RelayerOptions = {},
): RewardRelayer {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const onError =
    options.onError ?? ((err, id) => console.error(`[relayer] send ${id} failed:`, err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<RelayResult> | null = null;

  async function drain(): Promise<RelayResult> {
    let relayed = 0;
    let failed = 0;

    for (const queued of notifier.pending()) {
      const { id } = queued.message;
      notifier.markAttempt(id);
      let receipt: BridgeReceipt;
      try {
        receipt = await client.sendMessage(queued.message);
      } catch (err) {
        failed++;
        onError(err, id);
        break;
      }

      // A rejected message stays queued like a failed send.
      if (receipt.status === "FAILED") {
        failed++;
        onError(new Error(`bridge rejected message ${id}`), id);
        break;
      }

      notifier.acknowledge(id);
      relayed++;
      if (options.onRelay) options.onRelay(receipt);
    }

    return { relayed, failed, remaining: notifier.size() };
  }

  function tick(): Promise<RelayResult> {
    // One pass at a time; overlapping callers share it.
    if (!inFlight) {
      inFlight = drain().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      void tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,
  };
}
