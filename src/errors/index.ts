/**
 * エラー型と API レスポンスの共通形式
 *
 * retryable / retryAfterMs は utils/retry が再試行の判断に使う
 */

// =============================================================================
// エラーコード
// =============================================================================

export const ErrorCode = {
  UNAUTHORIZED: "UNAUTHORIZED", // 401
  VALIDATION_ERROR: "VALIDATION_ERROR", // 400
  RATE_LIMIT_EXCEEDED: "RATE_LIMIT_EXCEEDED", // 429
  GOOGLE_ADS_API_ERROR: "GOOGLE_ADS_API_ERROR",
  BIGQUERY_ERROR: "BIGQUERY_ERROR",
  DATA_UNAVAILABLE: "DATA_UNAVAILABLE", // 503
  CIRCUIT_OPEN: "CIRCUIT_OPEN", // 503
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR", // 500
  INTERNAL_ERROR: "INTERNAL_ERROR", // 500
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// 基底クラス
// =============================================================================

export interface AppErrorOptions {
  code: ErrorCodeType;
  message: string;
  statusCode?: number;
  details?: Record<string, unknown>;
  cause?: Error;
  retryable?: boolean;
  retryAfterMs?: number;
}

export class AppError extends Error {
  public readonly code: ErrorCodeType;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly retryable: boolean;
  public readonly retryAfterMs?: number;

  constructor(options: AppErrorOptions) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = "AppError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? 500;
    this.details = options.details;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
  }
}

// =============================================================================
// リクエスト起因のエラー
// =============================================================================

/**
 * 認証エラー（401）。再試行しない
 */
export class AuthenticationError extends AppError {
  constructor(message: string = "Authentication failed", details?: Record<string, unknown>) {
    super({ code: ErrorCode.UNAUTHORIZED, message, statusCode: 401, details });
    this.name = "AuthenticationError";
  }
}

export interface ValidationErrorDetail {
  field: string;
  message: string;
  received?: unknown;
}

/**
 * 入力検証エラー（400）
 */
export class ValidationError extends AppError {
  public readonly errors: ValidationErrorDetail[];

  constructor(errors: ValidationErrorDetail[], message: string = "Validation failed") {
    super({ code: ErrorCode.VALIDATION_ERROR, message, statusCode: 400, details: { errors } });
    this.name = "ValidationError";
    this.errors = errors;
  }

  static fromZodError(zodError: { issues: Array<{ path: (string | number)[]; message: string }> }): ValidationError {
    return new ValidationError(
      zodError.issues.map((issue) => ({ field: issue.path.join("."), message: issue.message }))
    );
  }
}

/**
 * 実行トリガーのレート制限（429）
 */
export class RateLimitError extends AppError {
  constructor(retryAfterMs: number = 60000, message: string = "Rate limit exceeded") {
    super({
      code: ErrorCode.RATE_LIMIT_EXCEEDED,
      message,
      statusCode: 429,
      retryable: true,
      retryAfterMs,
    });
    this.name = "RateLimitError";
  }
}

// =============================================================================
// 外部サービスのエラー
// =============================================================================

/**
 * Google Ads のエラー本文から読み取った内容
 *
 * apiStatus は google.rpc.Code の名前（"RESOURCE_EXHAUSTED" など）
 */
export interface GoogleAdsErrorInfo {
  httpStatus: number;
  apiStatus?: string;
  apiMessage?: string;
  requestId?: string;
}

/** クォータ超過として扱う gRPC ステータス */
const GOOGLE_ADS_QUOTA_STATUSES = new Set(["RESOURCE_EXHAUSTED"]);

/** 時間をおけば成功しうる gRPC ステータス */
const GOOGLE_ADS_TRANSIENT_STATUSES = new Set(["UNAVAILABLE", "DEADLINE_EXCEEDED", "INTERNAL", "ABORTED"]);

export class GoogleAdsApiError extends AppError {
  public readonly googleAdsRequestId?: string;
  public readonly apiStatus?: string;

  constructor(options: {
    message: string;
    statusCode: number;
    googleAdsRequestId?: string;
    apiStatus?: string;
    retryable?: boolean;
    retryAfterMs?: number;
  }) {
    super({
      code: ErrorCode.GOOGLE_ADS_API_ERROR,
      message: options.message,
      statusCode: options.statusCode,
      details: { googleAdsRequestId: options.googleAdsRequestId, apiStatus: options.apiStatus },
      retryable: options.retryable,
      retryAfterMs: options.retryAfterMs,
    });
    this.name = "GoogleAdsApiError";
    this.googleAdsRequestId = options.googleAdsRequestId;
    this.apiStatus = options.apiStatus;
  }

  /**
   * HTTP ステータスと gRPC ステータスから再試行可否を決める
   *
   * - 429 / RESOURCE_EXHAUSTED: 60秒後に再試行
   * - 5xx / UNAVAILABLE 等: 5秒後に再試行
   * - それ以外（401, 403, 400 など）: 再試行しない
   */
  static fromResponse(info: GoogleAdsErrorInfo): GoogleAdsApiError {
    const { httpStatus, apiStatus, apiMessage, requestId } = info;
    const label = apiStatus ? `${httpStatus} ${apiStatus}` : `${httpStatus}`;
    const message = `Google Ads API error ${label}${apiMessage ? `: ${apiMessage}` : ""}`;

    const quota = httpStatus === 429 || (apiStatus !== undefined && GOOGLE_ADS_QUOTA_STATUSES.has(apiStatus));
    const transient =
      httpStatus >= 500 || (apiStatus !== undefined && GOOGLE_ADS_TRANSIENT_STATUSES.has(apiStatus));

    return new GoogleAdsApiError({
      message,
      statusCode: httpStatus,
      googleAdsRequestId: requestId,
      apiStatus,
      retryable: quota || transient,
      retryAfterMs: quota ? 60000 : transient ? 5000 : undefined,
    });
  }
}

const BIGQUERY_RETRYABLE_PATTERNS = [
  /rate ?limit/i,
  /quota exceeded/i,
  /backendError/i,
  /(temporarily|service) unavailable/i,
  /internal error/i,
];

export class BigQueryError extends AppError {
  constructor(message: string, options: { cause?: Error; retryable?: boolean } = {}) {
    super({
      code: ErrorCode.BIGQUERY_ERROR,
      message,
      retryable: options.retryable,
      retryAfterMs: options.retryable ? 5000 : undefined,
      cause: options.cause,
    });
    this.name = "BigQueryError";
  }

  /**
   * クライアントのエラーを包む（メッセージから再試行可否を判定）
   */
  static fromError(error: Error): BigQueryError {
    return new BigQueryError(error.message, {
      cause: error,
      retryable: BIGQUERY_RETRYABLE_PATTERNS.some((pattern) => pattern.test(error.message)),
    });
  }
}

/**
 * クリックログを読めない（503）。集計を始められないので実行を中断する
 */
export class DataUnavailableError extends AppError {
  constructor(message: string, cause?: Error) {
    super({
      code: ErrorCode.DATA_UNAVAILABLE,
      message,
      statusCode: 503,
      retryable: cause instanceof AppError && cause.retryable,
      cause,
    });
    this.name = "DataUnavailableError";
  }
}

export class CircuitOpenError extends AppError {
  public readonly serviceName: string;

  constructor(serviceName: string, retryAfterMs: number = 30000) {
    super({
      code: ErrorCode.CIRCUIT_OPEN,
      message: `Circuit breaker is open for ${serviceName}`,
      statusCode: 503,
      details: { serviceName },
      retryable: true,
      retryAfterMs,
    });
    this.name = "CircuitOpenError";
    this.serviceName = serviceName;
  }
}

/**
 * 設定エラー。認証情報が欠けていれば集計前に実行を止める
 */
export class ConfigurationError extends AppError {
  public readonly missingConfig: string[];

  constructor(message: string, missingConfig: string[] = []) {
    super({
      code: ErrorCode.CONFIGURATION_ERROR,
      message,
      details: missingConfig.length > 0 ? { missingConfig } : undefined,
    });
    this.name = "ConfigurationError";
    this.missingConfig = missingConfig;
  }
}

// =============================================================================
// APIレスポンス
// =============================================================================

export interface ApiResponse<T = unknown> {
  success: boolean;
  statusCode: number;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    retryable?: boolean;
    retryAfterMs?: number;
  };
  meta?: {
    requestId?: string;
    timestamp: string;
  };
}

function responseMeta(requestId?: string): { requestId?: string; timestamp: string } {
  return { requestId, timestamp: new Date().toISOString() };
}

export class ApiResponseBuilder {
  static success<T>(data: T, options?: { statusCode?: number; requestId?: string }): ApiResponse<T> {
    return {
      success: true,
      statusCode: options?.statusCode ?? 200,
      data,
      meta: responseMeta(options?.requestId),
    };
  }

  /**
   * AppError 以外は 500 INTERNAL_ERROR として返す
   */
  static error(error: Error, requestId?: string): ApiResponse<never> {
    const appError = toAppError(error);
    return {
      success: false,
      statusCode: appError.statusCode,
      error: {
        code: appError.code,
        message: appError.message || "An unexpected error occurred",
        details: appError.details,
        retryable: appError.retryable,
        retryAfterMs: appError.retryAfterMs,
      },
      meta: responseMeta(requestId),
    };
  }

  static unauthorized(message: string = "Unauthorized", requestId?: string): ApiResponse<never> {
    return {
      success: false,
      statusCode: 401,
      error: { code: ErrorCode.UNAUTHORIZED, message, retryable: false },
      meta: responseMeta(requestId),
    };
  }
}

// =============================================================================
// ユーティリティ
// =============================================================================

/**
 * 通信レベルの一時的な失敗（タイムアウト・接続断）か
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  const code = "code" in error && typeof error.code === "string" ? error.code : "";
  if (["ETIMEDOUT", "ECONNRESET", "ECONNREFUSED", "EAI_AGAIN"].includes(code)) {
    return true;
  }
  // fetch の接続失敗は TypeError("fetch failed")
  return /timeout|fetch failed|socket hang up/i.test(error.message);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  return new AppError({
    code: ErrorCode.INTERNAL_ERROR,
    message: errorMessage(error),
    cause: error instanceof Error ? error : undefined,
    retryable: isRetryableError(error),
  });
}
