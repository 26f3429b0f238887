/**
 * Decision Calculator - キーワード統計から入札判定を導く（純粋関数）
 *
 * 判定は上から順に評価し、最初に一致したものを採用する:
 *
 * 1. clicks = 0                                  → SKIP（トラフィックなし）
 * 2. conversionCount = 0                         → PAUSE_OR_LOWER（コンバージョンなし）
 * 3. ROAS かつ conversionValue > 0               → INCREASE
 * 4. CPA かつ 平均CPA > maxCpa                   → DECREASE
 * 5. CPA かつ コンバージョン率 < minConversionRate → DECREASE
 * 6. MANUAL                                      → REVIEW
 * 7. それ以外                                     → NO_CHANGE
 *
 * 外部APIは呼ばない。実行モード（SHADOW / APPLY）に関係なく同じ判定を返す。
 */

import { KeywordStats, KeywordStatsMap, ResolvedKeyword } from "../attribution/types";
import {
  DecisionAction,
  KeywordDecision,
  KeywordDecisionMap,
  OptimizationStrategy,
  StrategyThresholds,
} from "./types";

/**
 * 平均CPA = conversionValue / conversionCount
 */
export function computeAverageCpa(stats: KeywordStats): number | null {
  if (stats.conversionCount <= 0) {
    return null;
  }
  return stats.conversionValue / stats.conversionCount;
}

/**
 * コンバージョン率 = conversionCount / clicks
 */
export function computeConversionRate(stats: KeywordStats): number | null {
  if (stats.clicks <= 0) {
    return null;
  }
  return stats.conversionCount / stats.clicks;
}

function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

/**
 * 単一キーワードの判定
 */
export function decideKeyword(
  keyword: ResolvedKeyword,
  stats: KeywordStats,
  strategy: OptimizationStrategy,
  thresholds: StrategyThresholds
): KeywordDecision {
  const snapshot: KeywordStats = { ...stats };

  if (stats.clicks === 0) {
    return { keyword, action: "SKIP", reasonCode: "NO_TRAFFIC", reason: "no traffic", stats: snapshot };
  }

  if (stats.conversionCount === 0) {
    return {
      keyword,
      action: "PAUSE_OR_LOWER",
      reasonCode: "NO_CONVERSIONS",
      reason: "no conversions",
      stats: snapshot,
    };
  }

  if (strategy === "ROAS" && stats.conversionValue > 0) {
    return {
      keyword,
      action: "INCREASE",
      reasonCode: "FAVORABLE_RETURN",
      reason: "favorable return",
      stats: snapshot,
    };
  }

  if (strategy === "CPA") {
    const averageCpa = computeAverageCpa(stats);
    if (averageCpa !== null && averageCpa > thresholds.maxCpa) {
      return {
        keyword,
        action: "DECREASE",
        reasonCode: "CPA_ABOVE_MAX",
        reason: `average CPA ${averageCpa.toFixed(2)} exceeds max CPA ${thresholds.maxCpa}`,
        stats: snapshot,
      };
    }

    const conversionRate = computeConversionRate(stats);
    if (conversionRate !== null && conversionRate < thresholds.minConversionRate) {
      return {
        keyword,
        action: "DECREASE",
        reasonCode: "CONVERSION_RATE_BELOW_MIN",
        reason: `conversion rate ${formatPercent(conversionRate)} below minimum ${formatPercent(
          thresholds.minConversionRate
        )}`,
        stats: snapshot,
      };
    }
  }

  if (strategy === "MANUAL") {
    return {
      keyword,
      action: "REVIEW",
      reasonCode: "MANUAL_STRATEGY",
      reason: "manual strategy selected",
      stats: snapshot,
    };
  }

  return {
    keyword,
    action: "NO_CHANGE",
    reasonCode: "WITHIN_THRESHOLDS",
    reason: `${strategy} thresholds satisfied`,
    stats: snapshot,
  };
}

/**
 * 全キーワードの判定（統計マップのキー1つにつき判定1つ）
 */
export function computeDecisions(
  stats: KeywordStatsMap,
  strategy: OptimizationStrategy,
  thresholds: StrategyThresholds
): KeywordDecisionMap {
  const decisions: KeywordDecisionMap = new Map();
  for (const [keyword, keywordStats] of stats) {
    decisions.set(keyword, decideKeyword(keyword, keywordStats, strategy, thresholds));
  }
  return decisions;
}

/**
 * アクション別の件数を集計
 */
export function countDecisionActions(
  decisions: Iterable<KeywordDecision>
): Record<DecisionAction, number> {
  const counts: Record<DecisionAction, number> = {
    INCREASE: 0,
    DECREASE: 0,
    PAUSE_OR_LOWER: 0,
    REVIEW: 0,
    SKIP: 0,
    NO_CHANGE: 0,
  };
  for (const decision of decisions) {
    counts[decision.action]++;
  }
  return counts;
}
