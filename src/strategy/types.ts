/**
 * 入札戦略・判定の型定義
 */

import { KeywordStats, ResolvedKeyword } from "../attribution/types";

// =============================================================================
// 戦略
// =============================================================================

export type OptimizationStrategy = "ROAS" | "CPA" | "MANUAL";

export interface StrategyThresholds {
  /** 許容する最大CPA */
  maxCpa: number;
  /** 許容する最小コンバージョン率（0.05 = 5%） */
  minConversionRate: number;
}

// =============================================================================
// 判定
// =============================================================================

export type DecisionAction =
  | "INCREASE"
  | "DECREASE"
  | "PAUSE_OR_LOWER"
  | "REVIEW"
  | "SKIP"
  | "NO_CHANGE";

export const VALID_DECISION_ACTIONS: readonly DecisionAction[] = [
  "INCREASE",
  "DECREASE",
  "PAUSE_OR_LOWER",
  "REVIEW",
  "SKIP",
  "NO_CHANGE",
];

export type DecisionReasonCode =
  | "NO_TRAFFIC"
  | "NO_CONVERSIONS"
  | "FAVORABLE_RETURN"
  | "CPA_ABOVE_MAX"
  | "CONVERSION_RATE_BELOW_MIN"
  | "MANUAL_STRATEGY"
  | "WITHIN_THRESHOLDS";

/**
 * キーワードごとの判定
 */
export interface KeywordDecision {
  keyword: ResolvedKeyword;
  action: DecisionAction;
  reasonCode: DecisionReasonCode;
  /** 人が読める判定理由 */
  reason: string;
  /** 判定に使った統計のスナップショット */
  stats: KeywordStats;
}

export type KeywordDecisionMap = Map<ResolvedKeyword, KeywordDecision>;

// =============================================================================
// 入札変更
// =============================================================================

export interface BidAdjustmentOptions {
  /** 1回の変更幅（0.1 = ±10%） */
  stepRatio: number;
}

/**
 * 判定から導いた入札変更
 *
 * newBid は常に [oldBid × 0.7, oldBid × 1.3] に収まる
 */
export interface BidAdjustment {
  oldBid: number;
  /** クランプ前の計算値 */
  rawBid: number;
  newBid: number;
  /** (newBid - oldBid) / oldBid */
  changeRatio: number;
  /** クランプが効いたかどうか */
  clipped: boolean;
}
