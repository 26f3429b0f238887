/**
 * Report Builder - 実行結果をレポートにまとめる（純粋関数）
 */

import { summarizeBidChangeResults } from "../apply/bid-applier";
import { countDecisionActions, computeAverageCpa, computeConversionRate } from "../strategy/decision-calculator";
import {
  KeywordBidChangeEntry,
  KeywordReportEntry,
  OptimizationReport,
  OptimizationReportSummary,
  PlannedBidChangeResult,
  ReportInput,
} from "./types";

function toBidChangeEntry(planned: PlannedBidChangeResult): KeywordBidChangeEntry {
  const { adjustment, result } = planned;
  const entry: KeywordBidChangeEntry = {
    criterionId: result.criterionId,
    adGroupId: result.adGroupId,
    oldBid: adjustment.oldBid,
    rawBid: adjustment.rawBid,
    newBid: adjustment.newBid,
    changeRatio: adjustment.changeRatio,
    clipped: adjustment.clipped,
    status: result.status,
  };
  if (result.skipReason) {
    entry.skipReason = result.skipReason;
  }
  if (result.error) {
    entry.error = result.error;
  }
  return entry;
}

/**
 * 実行サマリーを計算
 */
export function buildReportSummary(input: ReportInput): OptimizationReportSummary {
  const { run, resolution, aggregation, bidChanges } = input;

  let totalClicks = 0;
  let totalCost = 0;
  let totalConversions = 0;
  let totalConversionValue = 0;
  for (const stats of run.stats.values()) {
    totalClicks += stats.clicks;
    totalCost += stats.cost;
    totalConversions += stats.conversionCount;
    totalConversionValue += stats.conversionValue;
  }

  const applyStats = summarizeBidChangeResults(bidChanges.map((planned) => planned.result));

  return {
    keywordCount: run.decisions.size,
    actionCounts: countDecisionActions(run.decisions.values()),
    totalClicks,
    totalCost,
    totalConversions,
    totalConversionValue,
    records: {
      processed: aggregation.processedRecordCount,
      skipped: aggregation.skippedRecordCount,
      unidentified: aggregation.unidentifiedRecordCount,
    },
    resolution: {
      requested: resolution.requestedCount,
      resolved: resolution.resolvedCount,
      unmapped: resolution.unmappedCount,
      failedBatches: resolution.failedBatchCount,
    },
    apply: {
      totalChanges: applyStats.totalChanges,
      applied: applyStats.totalApplied,
      shadow: applyStats.totalShadow,
      skipped: applyStats.totalSkipped,
      failed: applyStats.totalFailed,
    },
  };
}

/**
 * レポートを組み立てる
 *
 * キーワードは判定マップの順序で並ぶ
 */
export function buildOptimizationReport(
  input: ReportInput,
  generatedAt: Date = new Date()
): OptimizationReport {
  const { run, bidChanges } = input;

  const changesByKeyword = new Map<string, KeywordBidChangeEntry[]>();
  for (const planned of bidChanges) {
    const entries = changesByKeyword.get(planned.keyword) ?? [];
    entries.push(toBidChangeEntry(planned));
    changesByKeyword.set(planned.keyword, entries);
  }

  const keywords: KeywordReportEntry[] = [];
  for (const decision of run.decisions.values()) {
    keywords.push({
      keyword: decision.keyword,
      action: decision.action,
      reasonCode: decision.reasonCode,
      reason: decision.reason,
      stats: { ...decision.stats },
      averageCpa: computeAverageCpa(decision.stats),
      conversionRate: computeConversionRate(decision.stats),
      bidChanges: changesByKeyword.get(decision.keyword) ?? [],
    });
  }

  return {
    runId: run.runId,
    campaignId: run.campaignId,
    strategy: run.strategy,
    thresholds: { ...run.thresholds },
    windowDays: run.windowDays,
    mode: run.mode,
    triggerSource: run.triggerSource,
    startedAt: run.startedAt.toISOString(),
    generatedAt: generatedAt.toISOString(),
    summary: buildReportSummary(input),
    keywords,
  };
}
