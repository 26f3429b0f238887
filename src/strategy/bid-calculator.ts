/**
 * Bid Calculator - 判定を入札額の変更に変換
 *
 * 判定1回につき ±stepRatio の単一ステップで動かし、
 * 結果は戦略に関係なく現在入札額の [0.7倍, 1.3倍] にクランプする。
 */

import { BID_LIMITS } from "../constants";
import {
  BidAdjustment,
  BidAdjustmentOptions,
  DecisionAction,
} from "./types";

export const DEFAULT_BID_ADJUSTMENT_OPTIONS: BidAdjustmentOptions = {
  stepRatio: BID_LIMITS.DEFAULT_STEP_RATIO,
};

/**
 * アクションごとの変更方向
 */
export function actionDirection(action: DecisionAction): -1 | 0 | 1 {
  switch (action) {
    case "INCREASE":
      return 1;
    case "DECREASE":
    case "PAUSE_OR_LOWER":
      return -1;
    default:
      return 0;
  }
}

/**
 * クランプ前の入札額
 */
export function computeRawBid(
  action: DecisionAction,
  currentBid: number,
  stepRatio: number = BID_LIMITS.DEFAULT_STEP_RATIO
): number {
  return currentBid * (1 + actionDirection(action) * stepRatio);
}

/**
 * 入札額を [currentBid × 0.7, currentBid × 1.3] にクランプ
 */
export function clampBid(
  currentBid: number,
  rawBid: number
): { bid: number; clipped: boolean } {
  const min = currentBid * BID_LIMITS.MIN_RATIO;
  const max = currentBid * BID_LIMITS.MAX_RATIO;

  if (Number.isNaN(rawBid)) {
    return { bid: currentBid, clipped: true };
  }
  if (rawBid < min) {
    return { bid: min, clipped: true };
  }
  if (rawBid > max) {
    return { bid: max, clipped: true };
  }
  return { bid: rawBid, clipped: false };
}

/**
 * 判定から入札変更を計算
 *
 * 現在入札額が正でない場合は変更を計算しない（null）
 */
export function computeBidAdjustment(
  action: DecisionAction,
  currentBid: number,
  options: BidAdjustmentOptions = DEFAULT_BID_ADJUSTMENT_OPTIONS
): BidAdjustment | null {
  if (!Number.isFinite(currentBid) || currentBid <= 0) {
    return null;
  }

  const rawBid = computeRawBid(action, currentBid, options.stepRatio);
  const { bid, clipped } = clampBid(currentBid, rawBid);

  return {
    oldBid: currentBid,
    rawBid,
    newBid: bid,
    changeRatio: (bid - currentBid) / currentBid,
    clipped,
  };
}
