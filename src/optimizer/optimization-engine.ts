/**
 * Optimization Engine - キーワード入札最適化の実行
 *
 * 1回の実行は以下の段階を順に進める（段階をまたいだ並行処理はしない）:
 *
 * 1. TrafficSource からアトリビューション期間のクリックを取得
 * 2. キャンペーンの有効キーワードを取得
 * 3. クリック識別子をキーワードへ解決（バッチ単位）
 * 4. キーワード単位に集計
 * 5. 戦略に従って判定し、入札変更を計算
 * 6. 実行モードに従って入札変更を適用（SHADOWでは送らない）
 * 7. レポートを組み立てて ReportSink に渡す（失敗してもログのみ）
 */

import { v4 as uuidv4 } from "uuid";
import {
  aggregateKeywordStats,
  collectClickIdentifiers,
  EnabledKeyword,
  IdentityResolver,
} from "../attribution";
import { BidChange, executeBidChanges } from "../apply";
import { errorMessage } from "../errors";
import { createChildLogger, StructuredLogger } from "../logger";
import { buildOptimizationReport, PlannedBidChangeResult } from "../report";
import {
  BidAdjustment,
  computeBidAdjustment,
  computeDecisions,
  countDecisionActions,
  KeywordDecisionMap,
} from "../strategy";
import {
  OptimizationDependencies,
  OptimizationOutcome,
  OptimizationRequest,
  OptimizationRun,
  OptimizationSettings,
} from "./types";

interface PlannedBidChange {
  keyword: string;
  adjustment: BidAdjustment;
  change: BidChange;
}

/**
 * 判定と有効キーワードから入札変更を計画（純粋関数）
 *
 * 入札額が変わらない判定（SKIP / REVIEW / NO_CHANGE）と、
 * 現在入札額が正でないキーワードは対象外
 */
export function planBidChanges(
  decisions: KeywordDecisionMap,
  enabledKeywords: readonly EnabledKeyword[],
  stepRatio: number
): PlannedBidChange[] {
  const planned: PlannedBidChange[] = [];

  for (const keyword of enabledKeywords) {
    const decision = decisions.get(keyword.text);
    if (!decision) {
      continue;
    }

    const adjustment = computeBidAdjustment(decision.action, keyword.currentBid, { stepRatio });
    if (!adjustment || adjustment.newBid === adjustment.oldBid) {
      continue;
    }

    planned.push({
      keyword: keyword.text,
      adjustment,
      change: {
        criterionId: keyword.criterionId,
        adGroupId: keyword.adGroupId,
        keywordText: keyword.text,
        oldBid: adjustment.oldBid,
        newBid: adjustment.newBid,
        reason: decision.reason,
      },
    });
  }

  return planned;
}

/**
 * 最適化を1回実行
 */
export async function runOptimization(
  request: OptimizationRequest,
  deps: OptimizationDependencies,
  settings: OptimizationSettings
): Promise<OptimizationOutcome> {
  const runId = uuidv4();
  const startedAt = new Date();
  const log: StructuredLogger = createChildLogger({ runId, campaignId: request.campaignId });
  const resolutionStrategy = request.resolutionStrategy ?? settings.resolutionStrategy;

  log.info("Starting keyword bid optimization", {
    strategy: request.strategy,
    mode: settings.mode,
    windowDays: request.attributionWindowDays,
    resolutionStrategy,
    triggerSource: request.triggerSource ?? "API",
  });

  // ========================================
  // Step 1-2: トラフィックと有効キーワード
  // ========================================
  const records = await deps.trafficSource.fetch(request.attributionWindowDays);
  const enabledKeywords = await deps.campaignDirectory.listEnabledKeywords(request.campaignId);

  log.info("Loaded traffic and enabled keywords", {
    recordCount: records.length,
    enabledKeywordCount: enabledKeywords.length,
  });

  // ========================================
  // Step 3: 識別子解決
  // ========================================
  const resolver = new IdentityResolver(
    deps.campaignDirectory,
    {
      strategy: resolutionStrategy,
      batchSize: settings.resolverBatchSize,
      concurrency: settings.resolverConcurrency,
    },
    log
  );
  const resolution = await resolver.resolve(
    request.campaignId,
    collectClickIdentifiers(records, settings.accountTimeZone)
  );

  // ========================================
  // Step 4: 集計
  // ========================================
  const aggregation = aggregateKeywordStats(records, resolution.mapping, {
    conversionKinds: settings.conversionKinds,
    enabledKeywords: enabledKeywords.map((keyword) => keyword.text),
  });

  // ========================================
  // Step 5: 判定・入札変更の計画
  // ========================================
  const thresholds = {
    maxCpa: request.maxCpa,
    minConversionRate: request.minConversionRate,
  };
  const decisions = computeDecisions(aggregation.stats, request.strategy, thresholds);
  const planned = planBidChanges(decisions, enabledKeywords, settings.bidStepRatio);

  log.info("Decisions computed", {
    keywordCount: decisions.size,
    actionCounts: countDecisionActions(decisions.values()),
    plannedChanges: planned.length,
  });

  // ========================================
  // Step 6: 入札変更の適用
  // ========================================
  const execution = await executeBidChanges(
    planned.map((item) => item.change),
    deps.changeApplier,
    settings.mode,
    settings.applySafety,
    log
  );

  const bidChanges: PlannedBidChangeResult[] = planned.map((item, index) => ({
    keyword: item.keyword,
    adjustment: item.adjustment,
    result: execution.results[index],
  }));

  const run: OptimizationRun = {
    runId,
    campaignId: request.campaignId,
    strategy: request.strategy,
    thresholds,
    windowDays: request.attributionWindowDays,
    mode: settings.mode,
    triggerSource: request.triggerSource ?? "API",
    stats: aggregation.stats,
    decisions,
    startedAt,
  };

  // ========================================
  // Step 7: レポート
  // ========================================
  const report = buildOptimizationReport({ run, resolution, aggregation, bidChanges });

  let reportPersisted = false;
  try {
    await deps.reportSink.write(report);
    reportPersisted = true;
  } catch (error) {
    log.error("Failed to write optimization report", { error: errorMessage(error) });
  }

  log.info("Keyword bid optimization completed", {
    durationMs: Date.now() - startedAt.getTime(),
    keywordCount: report.summary.keywordCount,
    applied: report.summary.apply.applied,
    shadow: report.summary.apply.shadow,
    failed: report.summary.apply.failed,
    reportPersisted,
  });

  return { run, report, reportPersisted };
}
