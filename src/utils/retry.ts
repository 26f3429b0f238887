/**
 * 外部API呼び出しの再試行とサーキットブレーカー
 *
 * 再試行するかは isRetryableError（AppError なら retryable）で決める。
 * ブレーカーは名前ごとにプロセス内で1つ
 */

import { logger } from "../logger";
import { AppError, CircuitOpenError, errorMessage, isRetryableError } from "../errors";

// =============================================================================
// 設定
// =============================================================================

export interface RetryConfig {
  /** 初回を除く再試行回数 */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export interface CircuitBreakerConfig {
  /** 連続失敗がこの回数に達したら OPEN */
  failureThreshold: number;
  /** OPEN から HALF_OPEN に移るまでの時間 */
  resetTimeoutMs: number;
  /** HALF_OPEN で通す試行数（全て成功すれば CLOSED） */
  halfOpenRequests: number;
}

const RETRY_DEFAULTS: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

const CIRCUIT_BREAKER_DEFAULTS: CircuitBreakerConfig = {
  failureThreshold: 5,
  resetTimeoutMs: 60000,
  halfOpenRequests: 3,
};

// =============================================================================
// サーキットブレーカー
// =============================================================================

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface CircuitBreakerStatus {
  state: CircuitState;
  failures: number;
}

export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  private failures = 0;
  private openedAt = 0;
  private halfOpenAttempts = 0;
  private halfOpenSuccesses = 0;

  constructor(
    readonly name: string,
    public config: CircuitBreakerConfig = CIRCUIT_BREAKER_DEFAULTS,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * 呼び出しを通してよいか（HALF_OPEN では試行枠を1つ消費する）
   */
  tryAcquire(): boolean {
    if (this.state === "OPEN") {
      if (this.now() - this.openedAt < this.config.resetTimeoutMs) {
        return false;
      }
      this.state = "HALF_OPEN";
      this.halfOpenAttempts = 0;
      this.halfOpenSuccesses = 0;
      logger.info("Circuit breaker transitioning to HALF_OPEN", { name: this.name });
    }

    if (this.state === "HALF_OPEN") {
      if (this.halfOpenAttempts >= this.config.halfOpenRequests) {
        return false;
      }
      this.halfOpenAttempts++;
    }
    return true;
  }

  recordSuccess(): void {
    if (this.state === "HALF_OPEN") {
      this.halfOpenSuccesses++;
      if (this.halfOpenSuccesses >= this.config.halfOpenRequests) {
        this.reset();
        logger.info("Circuit breaker CLOSED (recovered)", { name: this.name });
      }
      return;
    }
    this.failures = 0;
  }

  recordFailure(): void {
    this.failures++;
    if (this.state === "HALF_OPEN" || this.failures >= this.config.failureThreshold) {
      if (this.state !== "OPEN") {
        logger.warn("Circuit breaker OPEN", {
          name: this.name,
          failures: this.failures,
          threshold: this.config.failureThreshold,
        });
      }
      this.state = "OPEN";
      this.openedAt = this.now();
    }
  }

  reset(): void {
    this.state = "CLOSED";
    this.failures = 0;
    this.halfOpenAttempts = 0;
    this.halfOpenSuccesses = 0;
  }

  status(): CircuitBreakerStatus {
    return { state: this.state, failures: this.failures };
  }
}

const circuitBreakers = new Map<string, CircuitBreaker>();

/**
 * 名前のブレーカーを取得（なければ作成）。設定を渡せば上書きする
 */
export function circuitBreaker(name: string, config?: Partial<CircuitBreakerConfig>): CircuitBreaker {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker(name);
    circuitBreakers.set(name, breaker);
  }
  if (config) {
    breaker.config = { ...CIRCUIT_BREAKER_DEFAULTS, ...config };
  }
  return breaker;
}

export function getAllCircuitBreakerStatuses(): Map<string, CircuitBreakerStatus> {
  const statuses = new Map<string, CircuitBreakerStatus>();
  circuitBreakers.forEach((breaker, name) => statuses.set(name, breaker.status()));
  return statuses;
}

// =============================================================================
// 再試行
// =============================================================================

export interface RetryOptions {
  /** ブレーカー名（ログにも使う） */
  name: string;
  retryConfig?: Partial<RetryConfig>;
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>;
}

/**
 * 次の試行までの待ち時間
 *
 * AppError の retryAfterMs を優先し、なければ指数バックオフ。0〜20% のジッターを足す
 */
function backoffDelayMs(error: unknown, attempt: number, config: RetryConfig): number {
  const base =
    error instanceof AppError && error.retryAfterMs
      ? error.retryAfterMs
      : Math.min(config.baseDelayMs * config.backoffMultiplier ** attempt, config.maxDelayMs);
  return Math.round(base * (1 + Math.random() * 0.2));
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const config = { ...RETRY_DEFAULTS, ...options.retryConfig };
  const breaker = circuitBreaker(options.name, options.circuitBreakerConfig);

  if (!breaker.tryAcquire()) {
    throw new CircuitOpenError(options.name, breaker.config.resetTimeoutMs);
  }

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await fn();
      breaker.recordSuccess();
      return result;
    } catch (error) {
      const retryable = isRetryableError(error);
      if (!retryable || attempt >= config.maxRetries) {
        breaker.recordFailure();
        logger.error("Request failed (no more retries)", {
          name: options.name,
          attempt,
          retryable,
          error: errorMessage(error),
        });
        throw error;
      }

      const waitMs = backoffDelayMs(error, attempt, config);
      logger.warn("Retrying request", {
        name: options.name,
        attempt: attempt + 1,
        maxRetries: config.maxRetries,
        waitMs,
        error: errorMessage(error),
      });
      await sleep(waitMs);
    }
  }
}

// =============================================================================
// タイムアウト
// =============================================================================

/**
 * timeoutMs 以内に終わらなければ code=ETIMEDOUT のエラーで失敗させる
 */
export async function withTimeout<T>(fn: () => Promise<T>, timeoutMs: number, name: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(Object.assign(new Error(`Timeout after ${timeoutMs}ms: ${name}`), { code: "ETIMEDOUT" }));
    }, timeoutMs);
  });
  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * 1回の試行ごとにタイムアウトをかけて再試行する
 */
export function withRetryAndTimeout<T>(
  fn: () => Promise<T>,
  options: RetryOptions & { timeoutMs?: number }
): Promise<T> {
  const timeoutMs = options.timeoutMs ?? 30000;
  return withRetry(() => withTimeout(fn, timeoutMs, options.name), options);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
