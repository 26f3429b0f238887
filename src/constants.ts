/**
 * キーワード入札最適化エンジン - 定数定義
 */

// =============================================================================
// 入札変更の上下限
// =============================================================================
export const BID_LIMITS = {
  /** 1回の判定で動かす入札変更幅（±10%） */
  DEFAULT_STEP_RATIO: 0.1,
  /** 現在入札額に対する下限比率（-30%） */
  MIN_RATIO: 0.7,
  /** 現在入札額に対する上限比率（+30%） */
  MAX_RATIO: 1.3,
} as const;

// =============================================================================
// 識別子解決
// =============================================================================
export const RESOLVER = {
  /** 1回の外部クエリで渡せる識別子数の上限 */
  MAX_BATCH_SIZE: 50,
  /** 同時に発行するバッチ数のデフォルト */
  DEFAULT_CONCURRENCY: 1,
  /** 同時実行数の上限 */
  MAX_CONCURRENCY: 8,
} as const;

// =============================================================================
// 集計ラベル
// =============================================================================
export const ATTRIBUTION_LABELS = {
  /** URLから識別子を取り出せなかったレコードの集計先 */
  UNKNOWN_KEYWORD: "unknown",
  /** 解決できなかった識別子のラベル接頭辞 */
  UNMAPPED_PREFIX: "Unmapped",
} as const;

/**
 * コンバージョンとして数える conversion_kind のデフォルト
 */
export const DEFAULT_CONVERSION_KINDS: readonly string[] = ["registr", "deposit"];

/** クリック日を決めるタイムゾーンのデフォルト */
export const DEFAULT_ACCOUNT_TIME_ZONE = "UTC";

// =============================================================================
// 最適化リクエスト
// =============================================================================
export const OPTIMIZATION_DEFAULTS = {
  /** アトリビューション期間（日） */
  ATTRIBUTION_WINDOW_DAYS: 30,
  /** アトリビューション期間の上限（日） */
  MAX_ATTRIBUTION_WINDOW_DAYS: 90,
} as const;

// =============================================================================
// Google Ads API
// =============================================================================
export const GOOGLE_ADS_API = {
  /** デフォルトベースURL */
  DEFAULT_BASE_URL: "https://googleads.googleapis.com",
  /** デフォルトAPIバージョン */
  DEFAULT_API_VERSION: "v17",
  /** トークンURL */
  TOKEN_URL: "https://oauth2.googleapis.com/token",
  /** トークンキャッシュの余裕時間（秒） */
  TOKEN_CACHE_BUFFER_SECONDS: 300,
  /** 1リクエストのタイムアウト（ミリ秒） */
  REQUEST_TIMEOUT_MS: 30000,
  /** micros → 通貨単位 */
  MICROS_PER_UNIT: 1_000_000,
} as const;

// =============================================================================
// BigQuery
// =============================================================================
export const BIGQUERY = {
  /** データセットID */
  DATASET_ID: "keyword_bid_optimizer",
  /** ロケーション */
  LOCATION: "US",
  /** クリックログテーブルID */
  CLICKS_TABLE_ID: "paid_clicks",
  /** 実行サマリーテーブルID */
  OPTIMIZATION_RUNS_TABLE_ID: "optimization_runs",
  /** キーワード判定テーブルID */
  KEYWORD_DECISIONS_TABLE_ID: "keyword_decisions",
} as const;

// =============================================================================
// サーバー
// =============================================================================
export const SERVER = {
  /** デフォルトポート */
  DEFAULT_PORT: 8080,
} as const;
