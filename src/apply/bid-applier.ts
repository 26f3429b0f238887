/**
 * Bid Applier - 入札変更の実行
 *
 * 安全フィルターを通した変更を ChangeApplier に1件ずつ渡す。
 * 1件の失敗は他の変更を止めず、その変更の FAILED として記録する
 */

import { logger as rootLogger, StructuredLogger } from "../logger";
import { applyBidWithMode } from "../logging/shadowMode";
import { ExecutionMode } from "../logging/types";
import { filterApplyCandidates } from "./apply-filter";
import {
  ApplyExecutionStats,
  ApplySafetyConfig,
  BidChange,
  BidChangeResult,
  ChangeApplier,
  createEmptyApplyExecutionStats,
  DEFAULT_APPLY_SAFETY_CONFIG,
} from "./types";

export interface BidChangeExecution {
  /** 入力と同じ順序の結果 */
  results: BidChangeResult[];
  stats: ApplyExecutionStats;
}

/**
 * 結果リストから実行統計を集計
 */
export function summarizeBidChangeResults(
  results: readonly BidChangeResult[]
): ApplyExecutionStats {
  const stats = createEmptyApplyExecutionStats();
  stats.totalChanges = results.length;

  for (const result of results) {
    switch (result.status) {
      case "APPLIED":
        stats.totalApplied++;
        break;
      case "SHADOW":
        stats.totalShadow++;
        break;
      case "FAILED":
        stats.totalFailed++;
        break;
      case "SKIPPED":
        stats.totalSkipped++;
        if (result.skipReason) {
          stats.skipReasonCounts[result.skipReason]++;
        }
        break;
    }
  }

  return stats;
}

/**
 * 入札変更を実行モードに従って適用
 */
export async function executeBidChanges(
  changes: readonly BidChange[],
  applier: ChangeApplier,
  mode: ExecutionMode,
  config: ApplySafetyConfig = DEFAULT_APPLY_SAFETY_CONFIG,
  log: StructuredLogger = rootLogger
): Promise<BidChangeExecution> {
  const indexed = changes.map((change, index) => ({
    change,
    index,
    oldBid: change.oldBid,
    newBid: change.newBid,
  }));
  const { toApply, skipped } = filterApplyCandidates(indexed, config);
  const outcomes: Array<BidChangeResult | undefined> = new Array(changes.length);

  for (const { change, index, skipReason } of skipped) {
    outcomes[index] = { ...change, status: "SKIPPED", skipReason };
  }

  // 同じ広告グループへの同時更新を避けるため逐次実行
  for (const { change, index } of toApply) {
    const { wasApplied, error } = await applyBidWithMode(
      mode,
      () => applier.apply(change),
      {
        criterionId: change.criterionId,
        adGroupId: change.adGroupId,
        keywordText: change.keywordText,
        oldBid: change.oldBid,
        newBid: change.newBid,
      }
    );

    outcomes[index] = error
      ? { ...change, status: "FAILED", error: error.message }
      : { ...change, status: wasApplied ? "APPLIED" : "SHADOW" };
  }

  const results = outcomes.filter(
    (outcome): outcome is BidChangeResult => outcome !== undefined
  );

  const stats = summarizeBidChangeResults(results);
  log.info("Bid changes executed", {
    mode,
    totalChanges: stats.totalChanges,
    totalApplied: stats.totalApplied,
    totalShadow: stats.totalShadow,
    totalSkipped: stats.totalSkipped,
    totalFailed: stats.totalFailed,
  });

  return { results, stats };
}
