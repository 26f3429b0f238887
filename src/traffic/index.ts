/**
 * トラフィックソースモジュール
 */

export {
  BigQueryTrafficSource,
  TrafficBigQueryAdapterOptions,
  mapClickRowToRecord,
  parsePaidSource,
} from "./bigquery-adapter";
