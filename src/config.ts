/**
 * キーワード入札最適化エンジン - 環境変数設定
 */

import { isValidResolutionStrategy, ResolutionStrategy } from "./attribution/types";
import {
  BID_LIMITS,
  BIGQUERY,
  DEFAULT_ACCOUNT_TIME_ZONE,
  DEFAULT_CONVERSION_KINDS,
  GOOGLE_ADS_API,
  RESOLVER,
  SERVER,
} from "./constants";
import { ConfigurationError, errorMessage } from "./errors";
import { logger } from "./logger";

/**
 * Google Ads API 接続設定
 */
export interface GoogleAdsConfig {
  baseUrl: string;
  apiVersion: string;
  developerToken: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  /** 操作対象の広告アカウント（ハイフンなし） */
  customerId: string;
  /** MCC経由でアクセスする場合のマネージャーアカウント */
  loginCustomerId?: string;
}

/**
 * 環境変数の設定インターフェース
 */
export interface EnvConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  // Google Ads API設定
  googleAds: GoogleAdsConfig;

  // BigQuery設定
  bigqueryProjectId?: string;
  bigqueryDatasetId: string;
  bigqueryLocation: string;

  // 認証設定
  apiKey?: string;

  // 集計・解決設定
  /** コンバージョンとして数える conversion_kind */
  conversionKinds: string[];
  resolutionStrategy: ResolutionStrategy;
  /** 1バッチの識別子数（1〜50） */
  resolverBatchSize: number;
  /** 同時実行バッチ数（1〜8） */
  resolverConcurrency: number;
  /** クリック日を決めるアカウントのタイムゾーン（IANA名） */
  accountTimeZone: string;

  // 入札変更設定
  /** 1回の変更幅（0.1 = ±10%） */
  bidStepRatio: number;
}

/**
 * 必須環境変数のリスト
 */
export const REQUIRED_ENV_VARS = [
  "GOOGLE_ADS_DEVELOPER_TOKEN",
  "GOOGLE_ADS_CLIENT_ID",
  "GOOGLE_ADS_CLIENT_SECRET",
  "GOOGLE_ADS_REFRESH_TOKEN",
  "GOOGLE_ADS_CUSTOMER_ID",
] as const;

type RequiredEnvVar = (typeof REQUIRED_ENV_VARS)[number];

/**
 * 未設定（または空白のみ）の必須環境変数
 */
export function findMissingEnvVars(env: NodeJS.ProcessEnv = process.env): RequiredEnvVar[] {
  return REQUIRED_ENV_VARS.filter((varName) => !env[varName]?.trim());
}

/**
 * 環境変数を検証し、設定オブジェクトを返す
 * @throws {ConfigurationError} 必須環境変数が設定されていない場合
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const missingVars = findMissingEnvVars(env);
  if (missingVars.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missingVars.join(", ")}`,
      missingVars
    );
  }

  const required = (varName: RequiredEnvVar): string => (env[varName] ?? "").trim();

  return {
    // サーバー設定
    port: parseIntegerInRange(env, "PORT", SERVER.DEFAULT_PORT, 1, 65535),
    nodeEnv: env.NODE_ENV || "development",

    // Google Ads API設定（顧客IDは "123-456-7890" 表記も受け付ける）
    googleAds: {
      baseUrl: env.GOOGLE_ADS_API_BASE_URL || GOOGLE_ADS_API.DEFAULT_BASE_URL,
      apiVersion: env.GOOGLE_ADS_API_VERSION || GOOGLE_ADS_API.DEFAULT_API_VERSION,
      developerToken: required("GOOGLE_ADS_DEVELOPER_TOKEN"),
      clientId: required("GOOGLE_ADS_CLIENT_ID"),
      clientSecret: required("GOOGLE_ADS_CLIENT_SECRET"),
      refreshToken: required("GOOGLE_ADS_REFRESH_TOKEN"),
      customerId: normalizeCustomerId(required("GOOGLE_ADS_CUSTOMER_ID")),
      loginCustomerId: env.GOOGLE_ADS_LOGIN_CUSTOMER_ID
        ? normalizeCustomerId(env.GOOGLE_ADS_LOGIN_CUSTOMER_ID)
        : undefined,
    },

    // BigQuery設定
    bigqueryProjectId: env.BIGQUERY_PROJECT_ID || undefined,
    bigqueryDatasetId: env.BIGQUERY_DATASET_ID || BIGQUERY.DATASET_ID,
    bigqueryLocation: env.BIGQUERY_LOCATION || BIGQUERY.LOCATION,

    // 認証設定
    apiKey: env.API_KEY || undefined,

    // 集計・解決設定
    conversionKinds: parseConversionKinds(env.CONVERSION_KINDS),
    resolutionStrategy: parseResolutionStrategy(env.RESOLUTION_STRATEGY),
    resolverBatchSize: parseIntegerInRange(
      env,
      "RESOLVER_BATCH_SIZE",
      RESOLVER.MAX_BATCH_SIZE,
      1,
      RESOLVER.MAX_BATCH_SIZE
    ),
    resolverConcurrency: parseIntegerInRange(
      env,
      "RESOLVER_CONCURRENCY",
      RESOLVER.DEFAULT_CONCURRENCY,
      1,
      RESOLVER.MAX_CONCURRENCY
    ),
    accountTimeZone: parseTimeZone(env.GOOGLE_ADS_ACCOUNT_TIME_ZONE),

    // 入札変更設定
    bidStepRatio: parseStepRatio(env.BID_STEP_RATIO),
  };
}

// =============================================================================
// パーサー
// =============================================================================

/**
 * 顧客IDからハイフンを除去
 */
export function normalizeCustomerId(value: string): string {
  return value.replace(/-/g, "").trim();
}

/**
 * CONVERSION_KINDS（カンマ区切り）をパース
 * 空の場合はデフォルト（registr, deposit）
 */
export function parseConversionKinds(value: string | undefined): string[] {
  const kinds = (value ?? "")
    .split(",")
    .map((kind) => kind.trim())
    .filter((kind) => kind.length > 0);
  return kinds.length > 0 ? kinds : [...DEFAULT_CONVERSION_KINDS];
}

/**
 * RESOLUTION_STRATEGY をパース
 * 不正な値や未設定の場合は "TWO_HOP"
 */
export function parseResolutionStrategy(value: string | undefined): ResolutionStrategy {
  if (!value) {
    return "TWO_HOP";
  }
  const normalized = value.trim().toUpperCase();
  if (isValidResolutionStrategy(normalized)) {
    return normalized;
  }
  logger.warn("Invalid RESOLUTION_STRATEGY, using default", {
    envValue: value,
    default: "TWO_HOP",
  });
  return "TWO_HOP";
}

/**
 * GOOGLE_ADS_ACCOUNT_TIME_ZONE をパース
 * 未設定や Intl が解釈できない名前は "UTC"
 */
export function parseTimeZone(value: string | undefined): string {
  const timeZone = value?.trim();
  if (!timeZone) {
    return DEFAULT_ACCOUNT_TIME_ZONE;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return timeZone;
  } catch (error) {
    logger.warn("Invalid GOOGLE_ADS_ACCOUNT_TIME_ZONE, using default", {
      envValue: value,
      default: DEFAULT_ACCOUNT_TIME_ZONE,
      error: errorMessage(error),
    });
    return DEFAULT_ACCOUNT_TIME_ZONE;
  }
}

/**
 * BID_STEP_RATIO をパース（0 < ratio ≤ 0.3）
 */
export function parseStepRatio(value: string | undefined): number {
  if (!value) {
    return BID_LIMITS.DEFAULT_STEP_RATIO;
  }
  const parsed = parseFloat(value);
  if (!isNaN(parsed) && parsed > 0 && parsed <= 1 - BID_LIMITS.MIN_RATIO) {
    return parsed;
  }
  logger.warn("Invalid BID_STEP_RATIO, using default", {
    envValue: value,
    default: BID_LIMITS.DEFAULT_STEP_RATIO,
  });
  return BID_LIMITS.DEFAULT_STEP_RATIO;
}

function parseIntegerInRange(
  env: NodeJS.ProcessEnv,
  varName: string,
  defaultValue: number,
  min: number,
  max: number
): number {
  const value = env[varName];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (!isNaN(parsed) && parsed >= min && parsed <= max) {
    return parsed;
  }
  logger.warn(`Invalid ${varName}, using default`, {
    envValue: value,
    default: defaultValue,
    min,
    max,
  });
  return defaultValue;
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 * @returns 検証結果とエラーメッセージ
 */
export function validateEnvConfig(
  env: NodeJS.ProcessEnv = process.env
): { valid: boolean; errors: string[] } {
  const errors: string[] = findMissingEnvVars(env).map(
    (varName) => `Missing required environment variable: ${varName}`
  );

  // ポート番号の検証
  const port = parseInt(env.PORT || String(SERVER.DEFAULT_PORT), 10);
  if (isNaN(port) || port < 1 || port > 65535) {
    errors.push(`Invalid PORT value: ${env.PORT}`);
  }

  const customerId = env.GOOGLE_ADS_CUSTOMER_ID;
  if (customerId && !/^\d+$/.test(normalizeCustomerId(customerId))) {
    errors.push(`Invalid GOOGLE_ADS_CUSTOMER_ID value: ${customerId}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
