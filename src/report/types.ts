/**
 * 実行レポート - 型定義
 */

import {
  IdentityResolutionResult,
  KeywordAggregationResult,
  KeywordStats,
  ResolvedKeyword,
} from "../attribution/types";
import { ApplySkipReason, ApplyStatus, BidChangeResult } from "../apply/types";
import { ExecutionMode, TriggerSource } from "../logging/types";
import { OptimizationRun } from "../optimizer/types";
import {
  BidAdjustment,
  DecisionAction,
  DecisionReasonCode,
  OptimizationStrategy,
  StrategyThresholds,
} from "../strategy/types";

// =============================================================================
// レポート
// =============================================================================

export interface KeywordBidChangeEntry {
  criterionId: string;
  adGroupId: string;
  oldBid: number;
  rawBid: number;
  newBid: number;
  changeRatio: number;
  clipped: boolean;
  status: ApplyStatus;
  skipReason?: ApplySkipReason;
  error?: string;
}

export interface KeywordReportEntry {
  keyword: ResolvedKeyword;
  action: DecisionAction;
  reasonCode: DecisionReasonCode;
  reason: string;
  stats: KeywordStats;
  averageCpa: number | null;
  conversionRate: number | null;
  /** 同じキーワードテキストを持つ条件ごとの入札変更 */
  bidChanges: KeywordBidChangeEntry[];
}

export interface OptimizationReportSummary {
  keywordCount: number;
  actionCounts: Record<DecisionAction, number>;
  totalClicks: number;
  totalCost: number;
  totalConversions: number;
  totalConversionValue: number;
  records: {
    processed: number;
    skipped: number;
    unidentified: number;
  };
  resolution: {
    requested: number;
    resolved: number;
    unmapped: number;
    failedBatches: number;
  };
  apply: {
    totalChanges: number;
    applied: number;
    shadow: number;
    skipped: number;
    failed: number;
  };
}

export interface OptimizationReport {
  runId: string;
  campaignId: string;
  strategy: OptimizationStrategy;
  thresholds: StrategyThresholds;
  windowDays: number;
  mode: ExecutionMode;
  triggerSource: TriggerSource;
  startedAt: string;
  generatedAt: string;
  summary: OptimizationReportSummary;
  keywords: KeywordReportEntry[];
}

// =============================================================================
// 入力
// =============================================================================

/**
 * 判定から計画された入札変更とその適用結果
 */
export interface PlannedBidChangeResult {
  keyword: ResolvedKeyword;
  adjustment: BidAdjustment;
  result: BidChangeResult;
}

export interface ReportInput {
  run: OptimizationRun;
  resolution: IdentityResolutionResult;
  aggregation: KeywordAggregationResult;
  bidChanges: readonly PlannedBidChangeResult[];
}

// =============================================================================
// 出力先
// =============================================================================

/**
 * レポートの出力先
 *
 * 書き込み失敗は実行全体を失敗させない（呼び出し側でログのみ）
 */
export interface ReportSink {
  write(report: OptimizationReport): Promise<void>;
}

// =============================================================================
// BigQuery 行
// =============================================================================

export interface OptimizationRunRow {
  run_id: string;
  campaign_id: string;
  strategy: string;
  mode: string;
  trigger_source: string;
  window_days: number;
  max_cpa: number;
  min_conversion_rate: number;
  keyword_count: number;
  total_clicks: number;
  total_cost: number;
  total_conversions: number;
  requested_identifiers: number;
  unmapped_identifiers: number;
  failed_batches: number;
  applied_changes: number;
  shadow_changes: number;
  skipped_changes: number;
  failed_changes: number;
  started_at: string;
  generated_at: string;
}

export interface KeywordDecisionRow {
  run_id: string;
  campaign_id: string;
  keyword: string;
  action: string;
  reason_code: string;
  reason: string;
  clicks: number;
  cost: number;
  conversion_count: number;
  conversion_value: number;
  average_cost_per_click: number;
  average_cpa: number | null;
  conversion_rate: number | null;
  /** KeywordBidChangeEntry[] の JSON */
  bid_changes: string;
  generated_at: string;
}
