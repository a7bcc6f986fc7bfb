/**
 * Reward notifier — outbox of reward notifications awaiting the bridge.
 *
 * The pool enqueues a notification for every committed bond release. The
 * relayer drains the outbox and acknowledges what the bridge accepted;
 * anything unacknowledged stays queued for the next attempt.
 *
 * With a capacity set, a full outbox drops its oldest entry to make room.
 * The service sets one only when no bridge is configured.
 */

import {
  encodeRewardPayload,
  rewardMessageId,
  type Address,
  type RewardNotificationV1,
} from "@valpool/protocol";
import type { BridgeMessage } from "@valpool/bridge-client";

export interface QueuedNotification {
  notification: RewardNotificationV1;
  message: BridgeMessage;
  /** L1 time of the release that produced it (s). */
  queuedAt: number;
  attempts: number;
}

export interface RewardNotifierOptions {
  /** L2 reward vault. */
  target: Address;
  gasLimit: number;
  /** Maximum queued notifications. Unbounded when omitted. */
  capacity?: number;
}

export class RewardNotifier {
  private readonly outbox = new Map<string, QueuedNotification>();
  private readonly target: Address;
  private readonly gasLimit: number;
  private readonly capacity: number;

  constructor(opts: RewardNotifierOptions) {
    this.target = opts.target;
    this.gasLimit = opts.gasLimit;
    this.capacity = opts.capacity ?? Infinity;
  }

  enqueue(notification: RewardNotificationV1, queuedAt: number): QueuedNotification {
    const id = rewardMessageId(notification);
    const existing = this.outbox.get(id);
    if (existing) return existing;

    if (this.outbox.size >= this.capacity) {
      const oldest = this.outbox.keys().next();
      if (!oldest.done) this.outbox.delete(oldest.value);
    }

    const queued: QueuedNotification = {
      notification,
      message: {
        id,
        target: this.target,
        gasLimit: this.gasLimit,
        data: encodeRewardPayload(notification),
      },
      queuedAt,
      attempts: 0,
    };
    this.outbox.set(id, queued);
    return queued;
  }

  /** Queued notifications, oldest first. */
  pending(): QueuedNotification[] {
    return [...this.outbox.values()];
  }

  markAttempt(id: string): void {
    const queued = this.outbox.get(id);
    if (queued) queued.attempts++;
  }

  acknowledge(id: string): boolean {
    return this.outbox.delete(id);
  }

  size(): number {
    return this.outbox.size;
  }
}
