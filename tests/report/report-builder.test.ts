/**
 * レポート組み立てのテスト
 */

import { buildOptimizationReport } from "../../src/report/report-builder";
import { ReportInput } from "../../src/report/types";
import { computeDecisions } from "../../src/strategy/decision-calculator";
import { KeywordStatsMap } from "../../src/attribution/types";

function createInput(): ReportInput {
  const stats: KeywordStatsMap = new Map([
    ["kw1", { clicks: 4, cost: 20, conversionCount: 2, conversionValue: 12, averageCostPerClick: 5 }],
    ["kw2", { clicks: 2, cost: 6, conversionCount: 0, conversionValue: 0, averageCostPerClick: 3 }],
  ]);
  const thresholds = { maxCpa: 5, minConversionRate: 0 };
  const decisions = computeDecisions(stats, "CPA", thresholds);

  return {
    run: {
      runId: "run-1",
      campaignId: "123",
      strategy: "CPA",
      thresholds,
      windowDays: 14,
      mode: "APPLY",
      triggerSource: "MANUAL",
      stats,
      decisions,
      startedAt: new Date("2026-01-05T03:00:00.000Z"),
    },
    resolution: {
      mapping: new Map(),
      batches: [],
      requestedCount: 5,
      resolvedCount: 3,
      unmappedCount: 2,
      failedBatchCount: 1,
    },
    aggregation: {
      stats,
      processedRecordCount: 6,
      skippedRecordCount: 2,
      unidentifiedRecordCount: 0,
    },
    bidChanges: [
      {
        keyword: "kw1",
        adjustment: { oldBid: 2, rawBid: 1.8, newBid: 1.8, changeRatio: -0.1, clipped: false },
        result: {
          criterionId: "11",
          adGroupId: "1",
          keywordText: "kw1",
          oldBid: 2,
          newBid: 1.8,
          reason: "average CPA 6.00 exceeds max CPA 5",
          status: "FAILED",
          error: "mutate rejected",
        },
      },
      {
        keyword: "kw2",
        adjustment: { oldBid: 1, rawBid: 0.9, newBid: 0.9, changeRatio: -0.1, clipped: false },
        result: {
          criterionId: "22",
          adGroupId: "1",
          keywordText: "kw2",
          oldBid: 1,
          newBid: 0.9,
          reason: "no conversions",
          status: "SKIPPED",
          skipReason: "APPLY_LIMIT_REACHED",
        },
      },
    ],
  };
}

describe("buildOptimizationReport", () => {
  it("実行情報と時刻を ISO 文字列で持つ", () => {
    const report = buildOptimizationReport(createInput(), new Date("2026-01-05T03:00:02.500Z"));

    expect(report.runId).toBe("run-1");
    expect(report.triggerSource).toBe("MANUAL");
    expect(report.startedAt).toBe("2026-01-05T03:00:00.000Z");
    expect(report.generatedAt).toBe("2026-01-05T03:00:02.500Z");
  });

  it("キーワードごとに判定と入札変更をまとめる", () => {
    const report = buildOptimizationReport(createInput());

    expect(report.keywords[0]).toEqual({
      keyword: "kw1",
      action: "DECREASE",
      reasonCode: "CPA_ABOVE_MAX",
      reason: "average CPA 6.00 exceeds max CPA 5",
      stats: { clicks: 4, cost: 20, conversionCount: 2, conversionValue: 12, averageCostPerClick: 5 },
      averageCpa: 6,
      conversionRate: 0.5,
      bidChanges: [
        {
          criterionId: "11",
          adGroupId: "1",
          oldBid: 2,
          rawBid: 1.8,
          newBid: 1.8,
          changeRatio: -0.1,
          clipped: false,
          status: "FAILED",
          error: "mutate rejected",
        },
      ],
    });
    expect(report.keywords[1].averageCpa).toBeNull();
    expect(report.keywords[1].bidChanges[0].skipReason).toBe("APPLY_LIMIT_REACHED");
    expect(report.keywords[1].bidChanges[0]).not.toHaveProperty("error");
  });

  it("サマリーを集計する", () => {
    const { summary } = buildOptimizationReport(createInput());

    expect(summary).toEqual({
      keywordCount: 2,
      actionCounts: { INCREASE: 0, DECREASE: 1, PAUSE_OR_LOWER: 1, REVIEW: 0, SKIP: 0, NO_CHANGE: 0 },
      totalClicks: 6,
      totalCost: 26,
      totalConversions: 2,
      totalConversionValue: 12,
      records: { processed: 6, skipped: 2, unidentified: 0 },
      resolution: { requested: 5, resolved: 3, unmapped: 2, failedBatches: 1 },
      apply: { totalChanges: 2, applied: 0, shadow: 0, skipped: 1, failed: 1 },
    });
  });
});
