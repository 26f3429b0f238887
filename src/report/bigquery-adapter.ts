/**
 * Report BigQuery Adapter
 *
 * 実行レポートを BigQuery に保存する ReportSink
 * - optimization_runs: 実行ごとに1行
 * - keyword_decisions: キーワードごとに1行
 */

import { BigQuery } from "@google-cloud/bigquery";
import { BIGQUERY } from "../constants";
import { BigQueryError } from "../errors";
import { logger } from "../logger";
import {
  KeywordDecisionRow,
  OptimizationReport,
  OptimizationRunRow,
  ReportSink,
} from "./types";

export interface ReportBigQueryAdapterOptions {
  projectId?: string;
  dataset: string;
}

/**
 * レポートを optimization_runs 行に変換
 */
export function mapReportToRunRow(report: OptimizationReport): OptimizationRunRow {
  const { summary } = report;
  return {
    run_id: report.runId,
    campaign_id: report.campaignId,
    strategy: report.strategy,
    mode: report.mode,
    trigger_source: report.triggerSource,
    window_days: report.windowDays,
    max_cpa: report.thresholds.maxCpa,
    min_conversion_rate: report.thresholds.minConversionRate,
    keyword_count: summary.keywordCount,
    total_clicks: summary.totalClicks,
    total_cost: summary.totalCost,
    total_conversions: summary.totalConversions,
    requested_identifiers: summary.resolution.requested,
    unmapped_identifiers: summary.resolution.unmapped,
    failed_batches: summary.resolution.failedBatches,
    applied_changes: summary.apply.applied,
    shadow_changes: summary.apply.shadow,
    skipped_changes: summary.apply.skipped,
    failed_changes: summary.apply.failed,
    started_at: report.startedAt,
    generated_at: report.generatedAt,
  };
}

/**
 * レポートを keyword_decisions 行に変換
 */
export function mapReportToKeywordRows(report: OptimizationReport): KeywordDecisionRow[] {
  return report.keywords.map((entry) => ({
    run_id: report.runId,
    campaign_id: report.campaignId,
    keyword: entry.keyword,
    action: entry.action,
    reason_code: entry.reasonCode,
    reason: entry.reason,
    clicks: entry.stats.clicks,
    cost: entry.stats.cost,
    conversion_count: entry.stats.conversionCount,
    conversion_value: entry.stats.conversionValue,
    average_cost_per_click: entry.stats.averageCostPerClick,
    average_cpa: entry.averageCpa,
    conversion_rate: entry.conversionRate,
    bid_changes: JSON.stringify(entry.bidChanges),
    generated_at: report.generatedAt,
  }));
}

export class BigQueryReportSink implements ReportSink {
  private bigquery: BigQuery;
  private dataset: string;

  constructor(options: ReportBigQueryAdapterOptions) {
    this.bigquery = new BigQuery(options.projectId ? { projectId: options.projectId } : {});
    this.dataset = options.dataset;
  }

  async write(report: OptimizationReport): Promise<void> {
    const keywordRows = mapReportToKeywordRows(report);

    try {
      await this.bigquery
        .dataset(this.dataset)
        .table(BIGQUERY.OPTIMIZATION_RUNS_TABLE_ID)
        .insert([mapReportToRunRow(report)]);

      if (keywordRows.length > 0) {
        await this.bigquery
          .dataset(this.dataset)
          .table(BIGQUERY.KEYWORD_DECISIONS_TABLE_ID)
          .insert(keywordRows);
      }

      logger.info("Saved optimization report to BigQuery", {
        runId: report.runId,
        keywordCount: keywordRows.length,
      });
    } catch (error) {
      const wrapped = BigQueryError.fromError(
        error instanceof Error ? error : new Error(String(error))
      );
      logger.error("Failed to save optimization report", {
        runId: report.runId,
        error: wrapped.message,
      });
      throw wrapped;
    }
  }
}
