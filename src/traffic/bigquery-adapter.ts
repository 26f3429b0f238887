/**
 * Traffic BigQuery Adapter
 *
 * クリックログ（paid_clicks テーブル）から
 * アトリビューション期間内のレコードを取得する TrafficSource
 */

import { BigQuery } from "@google-cloud/bigquery";
import { TrafficRecord, TrafficSource } from "../attribution/types";
import { BIGQUERY } from "../constants";
import { BigQueryError, DataUnavailableError } from "../errors";
import { logger } from "../logger";
import {
  BigQueryClickRow,
  BigQueryClickRowSchema,
  safeParseArray,
} from "../schemas/external-api";

export interface TrafficBigQueryAdapterOptions {
  /** 未指定時はクライアントのデフォルトプロジェクト */
  projectId?: string;
  dataset: string;
  location?: string;
  tableId?: string;
}

/**
 * paid_source 列の値を真偽値に変換（"y" / "true" / "1" も有料扱い）
 */
export function parsePaidSource(value: BigQueryClickRow["paid_source"]): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    return ["y", "yes", "true", "1"].includes(value.trim().toLowerCase());
  }
  return false;
}

/**
 * BigQuery 行を TrafficRecord に変換
 */
export function mapClickRowToRecord(row: BigQueryClickRow): TrafficRecord {
  return {
    recordId: row.record_id ?? undefined,
    destinationUrl: row.destination_url ?? "",
    cost: row.cost ?? null,
    conversionKind: row.conversion_kind ?? null,
    sourceFlag: parsePaidSource(row.paid_source),
    timestamp: row.clicked_at ?? null,
  };
}

export class BigQueryTrafficSource implements TrafficSource {
  private bigquery: BigQuery;
  private tableRef: string;
  private location: string;

  constructor(options: TrafficBigQueryAdapterOptions) {
    this.bigquery = new BigQuery(options.projectId ? { projectId: options.projectId } : {});
    const tableId = options.tableId ?? BIGQUERY.CLICKS_TABLE_ID;
    this.tableRef = options.projectId
      ? `${options.projectId}.${options.dataset}.${tableId}`
      : `${options.dataset}.${tableId}`;
    this.location = options.location ?? BIGQUERY.LOCATION;
  }

  /**
   * 直近 windowDays 日のクリックレコードを取得
   * @throws {DataUnavailableError} クエリが失敗した場合
   */
  async fetch(windowDays: number): Promise<TrafficRecord[]> {
    const query = `
      SELECT
        record_id,
        clicked_at,
        destination_url,
        conversion_kind,
        cost,
        paid_source
      FROM \`${this.tableRef}\`
      WHERE clicked_at >= TIMESTAMP_SUB(CURRENT_TIMESTAMP(), INTERVAL @windowDays DAY)
      ORDER BY clicked_at
    `;

    let rows: unknown[];
    try {
      [rows] = await this.bigquery.query({
        query,
        params: { windowDays },
        location: this.location,
      });
    } catch (error) {
      const cause = BigQueryError.fromError(
        error instanceof Error ? error : new Error(String(error))
      );
      logger.error("Failed to fetch traffic records", {
        table: this.tableRef,
        windowDays,
        error: cause.message,
      });
      throw new DataUnavailableError(`Traffic source unavailable: ${cause.message}`, cause);
    }

    const { valid, invalid } = safeParseArray(BigQueryClickRowSchema, rows, {
      skipInvalid: true,
    });
    if (invalid.length > 0) {
      logger.warn("Skipped malformed traffic rows", {
        invalidCount: invalid.length,
        firstInvalidIndex: invalid[0].index,
      });
    }

    logger.info("Loaded traffic records from BigQuery", {
      table: this.tableRef,
      windowDays,
      count: valid.length,
    });

    return valid.map(mapClickRowToRecord);
  }
}
