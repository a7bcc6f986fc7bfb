/**
 * Late-submission penalty.
 *
 *   elapsed = actual − deadline
 *   if elapsed > ROUND: elapsed −= ROUND      (public-round submissions)
 *   penalty = clamp(elapsed − NON_PENALTY_PERIOD, 0, PENALTY_PERIOD)
 *
 * The penalty never touches bond principal; it scales the reward minted on
 * the L2 side (reward × (PENALTY_PERIOD − penalty) / PENALTY_PERIOD).
 */

import { roundDuration, type RoundTiming } from "./round.js";

export function computePenalty(
  timing: RoundTiming,
  expectedDeadline: number,
  actualTime: number,
): number {
  let elapsed = actualTime - expectedDeadline;
  const round = roundDuration(timing);
  if (elapsed > round) elapsed -= round;

  const penalty = elapsed - timing.nonPenaltyPeriod;
  if (penalty <= 0) return 0;
  return Math.min(penalty, timing.penaltyPeriod);
}

/**
 * Share of the full reward kept after the penalty, in basis points.
 * 10_000 = on time, 0 = penalty maxed out.
 */
export function rewardShareBps(penalty: number, penaltyPeriod: number): number {
  if (penaltyPeriod <= 0) return 10_000;
  const kept = Math.max(0, penaltyPeriod - penalty);
  return Math.floor((kept * 10_000) / penaltyPeriod);
}
