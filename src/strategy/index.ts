/**
 * 入札戦略モジュール
 *
 * 主要エクスポート:
 * - computeDecisions: キーワード統計 → 判定（純粋関数）
 * - computeBidAdjustment: 判定 → クランプ済み入札変更
 */

export {
  OptimizationStrategy,
  StrategyThresholds,
  DecisionAction,
  VALID_DECISION_ACTIONS,
  DecisionReasonCode,
  KeywordDecision,
  KeywordDecisionMap,
  BidAdjustmentOptions,
  BidAdjustment,
} from "./types";

export {
  decideKeyword,
  computeDecisions,
  computeAverageCpa,
  computeConversionRate,
  countDecisionActions,
} from "./decision-calculator";

export {
  computeBidAdjustment,
  computeRawBid,
  clampBid,
  actionDirection,
  DEFAULT_BID_ADJUSTMENT_OPTIONS,
} from "./bid-calculator";
