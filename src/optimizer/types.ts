/**
 * 最適化実行 - 型定義
 */

import { TrafficSource, CampaignDirectory, KeywordStatsMap, ResolutionStrategy } from "../attribution/types";
import { ApplySafetyConfig, ChangeApplier } from "../apply/types";
import { ExecutionMode, TriggerSource } from "../logging/types";
import { OptimizationReport, ReportSink } from "../report/types";
import { KeywordDecisionMap, OptimizationStrategy, StrategyThresholds } from "../strategy/types";

/**
 * 1回の最適化実行への入力
 */
export interface OptimizationRequest {
  campaignId: string;
  strategy: OptimizationStrategy;
  maxCpa: number;
  minConversionRate: number;
  attributionWindowDays: number;
  resolutionStrategy?: ResolutionStrategy;
  triggerSource?: TriggerSource;
}

/**
 * 実行設定（環境変数は設定レイヤーだけが読み、ここには値として渡す）
 */
export interface OptimizationSettings {
  mode: ExecutionMode;
  conversionKinds: readonly string[];
  resolutionStrategy: ResolutionStrategy;
  resolverBatchSize: number;
  resolverConcurrency: number;
  /** クリック日を決めるタイムゾーン */
  accountTimeZone: string;
  bidStepRatio: number;
  applySafety: ApplySafetyConfig;
}

/**
 * 外部コラボレーター
 */
export interface OptimizationDependencies {
  trafficSource: TrafficSource;
  campaignDirectory: CampaignDirectory;
  changeApplier: ChangeApplier;
  reportSink: ReportSink;
}

/**
 * 1回の実行の状態（実行ごとに生成され、実行間で共有しない）
 */
export interface OptimizationRun {
  runId: string;
  campaignId: string;
  strategy: OptimizationStrategy;
  thresholds: StrategyThresholds;
  windowDays: number;
  mode: ExecutionMode;
  triggerSource: TriggerSource;
  stats: KeywordStatsMap;
  decisions: KeywordDecisionMap;
  startedAt: Date;
}

export interface OptimizationOutcome {
  run: OptimizationRun;
  report: OptimizationReport;
  /** レポートの書き込みに成功したか */
  reportPersisted: boolean;
}
