/**
 * Validator pool — stake bonding and validator rotation engine.
 *
 * Entry points:
 *   deposit / withdraw            — anyone, for their own address
 *   createBond                    — checkpoint storage only
 *   increaseBond                  — dispute contract only
 *   release / unbond              — anyone, once the oldest bond expired
 *   nextValidator                 — read; who may submit next
 *
 * Every entry point takes `now` (L1 seconds) and runs against a draft of
 * the state. The draft, its events and its reward notifications are
 * committed together, or not at all.
 */

import { Value } from "@sinclair/typebox/value";
import type { BaseLogger } from "pino";
import {
  normalizeAddress,
  PoolParams,
  type Address,
  type RewardNotificationV1,
  type Turn,
} from "@valpool/protocol";
import type { CheckpointStorage } from "./checkpoint-storage/types.js";
import type { StakeCustody } from "./custody.js";
import { PoolError, isPoolError } from "./errors.js";
import { EventLog } from "./event-log/writer.js";
import type { EventEnvelope } from "./event-log/schemas.js";
import { RewardNotifier } from "./reward-notifier.js";
import { cloneState, createPoolState, type Bond, type PoolState } from "./state.js";
import type { PoolTx } from "./tx.js";
import * as ledger from "./views/ledger.js";
import * as bonds from "./views/bond-registry.js";
import { nextDeadline, nextValidator } from "./views/rotation.js";

export type PoolLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export interface ValidatorPoolOptions {
  params: PoolParams;
  storage: CheckpointStorage;
  custody: StakeCustody;
  logger: PoolLogger;
  eventLog?: EventLog;
  notifier?: RewardNotifier;
}

export interface BondView {
  checkpointIndex: number;
  amount: bigint;
  expiresAt: number;
  submitter: Address;
}

export class ValidatorPool {
  readonly params: PoolParams;
  readonly events: EventLog;
  readonly notifier: RewardNotifier;
  private readonly storage: CheckpointStorage;
  private readonly custody: StakeCustody;
  private readonly log: PoolLogger;
  private state: PoolState = createPoolState();

  constructor(opts: ValidatorPoolOptions) {
    if (!Value.Check(PoolParams, opts.params)) {
      const first = Value.Errors(PoolParams, opts.params).First();
      throw new Error(`Invalid pool params: ${first ? `${first.path} ${first.message}` : "unknown"}`);
    }
    this.params = opts.params;
    this.storage = opts.storage;
    this.custody = opts.custody;
    this.log = opts.logger;
    this.events = opts.eventLog ?? new EventLog();
    this.notifier =
      opts.notifier ??
      new RewardNotifier({ target: opts.params.rewardVault, gasLimit: opts.params.rewardGasLimit });
  }

  // ── Ledger ─────────────────────────────────────────────────────

  deposit(address: string, amount: bigint, now: number): bigint {
    const addr = requireAddress(address);
    return this.transact("deposit", now, (tx) => ledger.deposit(tx, this.custody, addr, amount));
  }

  withdraw(address: string, amount: bigint, now: number): bigint {
    const addr = requireAddress(address);
    return this.transact("withdraw", now, (tx) => ledger.withdraw(tx, this.custody, addr, amount));
  }

  balanceOf(address: string): bigint {
    return ledger.balanceOf(this.state, requireAddress(address));
  }

  isValidator(address: string): boolean {
    return ledger.isValidator(this.state, requireAddress(address));
  }

  validatorCount(): number {
    return ledger.validatorCount(this.state);
  }

  /** Validator set in rotation order. */
  validators(): Address[] {
    return [...this.state.validators.members];
  }

  // ── Bonds ──────────────────────────────────────────────────────

  createBond(
    caller: string,
    checkpointIndex: number,
    amount: bigint,
    expiresAt: number,
    now: number,
  ): BondView {
    const from = requireAddress(caller);
    return this.transact("createBond", now, (tx) =>
      toView(checkpointIndex, bonds.createBond(tx, from, checkpointIndex, amount, expiresAt)),
    );
  }

  increaseBond(caller: string, challenger: string, checkpointIndex: number, now: number): BondView {
    const from = requireAddress(caller);
    const who = requireAddress(challenger);
    return this.transact("increaseBond", now, (tx) =>
      toView(checkpointIndex, bonds.increaseBond(tx, from, who, checkpointIndex)),
    );
  }

  release(checkpointIndex: number, now: number): bonds.ReleaseResult {
    return this.transact("release", now, (tx) => bonds.release(tx, checkpointIndex));
  }

  unbond(now: number): bonds.ReleaseResult {
    return this.transact("unbond", now, (tx) => bonds.unbond(tx));
  }

  getBond(checkpointIndex: number): BondView {
    return toView(checkpointIndex, bonds.getBond(this.state, checkpointIndex));
  }

  pendingBonds(): BondView[] {
    return bonds.pendingBonds(this.state).map((b) => toView(b.checkpointIndex, b));
  }

  nextReleaseIndex(): number | null {
    return bonds.nextReleaseIndex(this.state);
  }

  // ── Rotation ───────────────────────────────────────────────────

  nextValidator(now: number): Turn {
    return nextValidator(this.state, this.params, this.storage, now);
  }

  /** L1 time by which the next expected checkpoint is due. */
  nextDeadline(): number {
    return nextDeadline(this.storage);
  }

  /** Turn rendered as an address: the sentinel during a public round. */
  nextValidatorAddress(now: number): Address {
    const turn = this.nextValidator(now);
    return turn.kind === "assigned" ? turn.validator : this.params.publicRoundAddress;
  }

  // ── Transactions ───────────────────────────────────────────────

  private transact<T>(op: string, now: number, fn: (tx: PoolTx) => T): T {
    const draft = cloneState(this.state);
    const events: Omit<EventEnvelope, "seq">[] = [];
    const notifications: RewardNotificationV1[] = [];

    const tx: PoolTx = {
      state: draft,
      params: this.params,
      storage: this.storage,
      now,
      emit: (type, payload) => {
        events.push({ type, timestamp: now, payload });
      },
      notify: (notification) => {
        notifications.push(notification);
      },
    };

    let result: T;
    try {
      result = fn(tx);
    } catch (err) {
      if (isPoolError(err)) {
        this.log.warn({ op, code: err.code, now }, err.message);
      } else {
        this.log.error({ op, err, now }, "pool operation failed");
      }
      throw err;
    }

    // Commit
    this.state = draft;
    this.events.append(events);
    for (const notification of notifications) {
      this.notifier.enqueue(notification, now);
    }

    this.log.debug({ op, now, events: events.map((e) => e.type) }, "pool operation committed");
    return result;
  }
}

function requireAddress(value: string): Address {
  const addr = normalizeAddress(value);
  if (addr === null) {
    throw new PoolError("InvalidAddress", `not an address: ${value}`);
  }
  return addr;
}

function toView(checkpointIndex: number, bond: Bond): BondView {
  return {
    checkpointIndex,
    amount: bond.amount,
    expiresAt: bond.expiresAt,
    submitter: bond.submitter,
  };
}
