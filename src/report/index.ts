/**
 * 実行レポートモジュール
 *
 * 主要エクスポート:
 * - buildOptimizationReport: 実行結果 → レポート（純粋関数）
 * - BigQueryReportSink: レポートの保存先
 */

export {
  KeywordBidChangeEntry,
  KeywordReportEntry,
  OptimizationReportSummary,
  OptimizationReport,
  PlannedBidChangeResult,
  ReportInput,
  ReportSink,
  OptimizationRunRow,
  KeywordDecisionRow,
} from "./types";

export { buildOptimizationReport, buildReportSummary } from "./report-builder";

export {
  BigQueryReportSink,
  ReportBigQueryAdapterOptions,
  mapReportToRunRow,
  mapReportToKeywordRows,
} from "./bigquery-adapter";
