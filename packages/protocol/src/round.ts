/**
 * Round and deadline arithmetic.
 *
 * A round is NON_PENALTY_PERIOD + PENALTY_PERIOD seconds long and is anchored
 * to the expected deadline of the next checkpoint:
 *
 *   deadline                       deadline + ROUND
 *      |── grace ──|── penalty ──|──── public round ────▶
 *
 * The expected deadline of an L2 block is the L1 time at which that block
 * exists: genesis + blockNumber × blockTime.
 */

export interface RoundTiming {
  /** Grace window after the deadline in which no penalty accrues (s). */
  nonPenaltyPeriod: number;
  /** Window after the grace period over which the penalty grows linearly (s). */
  penaltyPeriod: number;
}

export interface L2Clock {
  /** L1 timestamp of L2 block 0 (s). */
  genesisTime: number;
  /** Seconds per L2 block. */
  blockTime: number;
}

export function roundDuration(timing: RoundTiming): number {
  return timing.nonPenaltyPeriod + timing.penaltyPeriod;
}

/** L1 timestamp at which the given L2 block is expected to exist. */
export function computeL2Timestamp(clock: L2Clock, blockNumber: number): number {
  return clock.genesisTime + blockNumber * clock.blockTime;
}

/** True once a full round has elapsed past the deadline without a submission. */
export function isPublicRound(
  timing: RoundTiming,
  deadline: number,
  now: number,
): boolean {
  return now > deadline + roundDuration(timing);
}

export type RoundPhase = "early" | "grace" | "penalty" | "public";

/** Where `now` falls relative to a checkpoint deadline. */
export function roundPhase(
  timing: RoundTiming,
  deadline: number,
  now: number,
): RoundPhase {
  if (now < deadline) return "early";
  const elapsed = now - deadline;
  if (elapsed <= timing.nonPenaltyPeriod) return "grace";
  if (elapsed <= roundDuration(timing)) return "penalty";
  return "public";
}
