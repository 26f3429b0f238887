/**
 * 再試行・サーキットブレーカーのテスト
 */

import {
  CircuitBreaker,
  circuitBreaker,
  getAllCircuitBreakerStatuses,
  withRetry,
  withRetryAndTimeout,
  withTimeout,
} from "../src/utils/retry";
import { AppError, CircuitOpenError, ErrorCode } from "../src/errors";

function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}

const FAST_RETRY = { baseDelayMs: 5, maxDelayMs: 20 };

describe("withRetry", () => {
  it("成功すれば1回で結果を返す", async () => {
    const fn = jest.fn().mockResolvedValue("ok");

    await expect(withRetry(fn, { name: "retry-first-success" })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("接続エラーは再試行して成功を返す", async () => {
    const fn = jest
      .fn()
      .mockRejectedValueOnce(networkError("ECONNRESET"))
      .mockRejectedValueOnce(networkError("ETIMEDOUT"))
      .mockResolvedValue("recovered");

    const result = await withRetry(fn, {
      name: "retry-network",
      retryConfig: { maxRetries: 3, ...FAST_RETRY },
    });

    expect(result).toBe("recovered");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("再試行の上限に達したら最後のエラーを投げる", async () => {
    const fn = jest.fn().mockRejectedValue(networkError("ECONNREFUSED"));

    await expect(
      withRetry(fn, { name: "retry-exhausted", retryConfig: { maxRetries: 2, ...FAST_RETRY } })
    ).rejects.toThrow("connect ECONNREFUSED");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("一時的でないエラーは再試行しない", async () => {
    const fn = jest.fn().mockRejectedValue(new Error("invalid GAQL"));

    await expect(
      withRetry(fn, { name: "retry-permanent", retryConfig: { maxRetries: 3, ...FAST_RETRY } })
    ).rejects.toThrow("invalid GAQL");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("AppError は retryable に従う", async () => {
    const permanent = jest.fn().mockRejectedValue(
      new AppError({ code: ErrorCode.GOOGLE_ADS_API_ERROR, message: "forbidden", retryable: false })
    );
    const quota = jest
      .fn()
      .mockRejectedValueOnce(
        new AppError({ code: ErrorCode.GOOGLE_ADS_API_ERROR, message: "quota", retryable: true, retryAfterMs: 5 })
      )
      .mockResolvedValue("ok");

    await expect(
      withRetry(permanent, { name: "retry-app-permanent", retryConfig: { maxRetries: 3 } })
    ).rejects.toThrow("forbidden");
    await expect(
      withRetry(quota, { name: "retry-app-quota", retryConfig: { maxRetries: 1 } })
    ).resolves.toBe("ok");

    expect(permanent).toHaveBeenCalledTimes(1);
    expect(quota).toHaveBeenCalledTimes(2);
  });

  it("ブレーカーが OPEN なら呼び出さずに CircuitOpenError", async () => {
    const name = "retry-open-circuit";
    const failing = jest.fn().mockRejectedValue(networkError("ECONNRESET"));
    for (let i = 0; i < 2; i++) {
      await expect(
        withRetry(failing, {
          name,
          retryConfig: { maxRetries: 0 },
          circuitBreakerConfig: { failureThreshold: 2 },
        })
      ).rejects.toThrow("connect ECONNRESET");
    }

    const fn = jest.fn().mockResolvedValue("never");
    await expect(withRetry(fn, { name })).rejects.toBeInstanceOf(CircuitOpenError);
    expect(fn).not.toHaveBeenCalled();
    expect(getAllCircuitBreakerStatuses().get(name)).toEqual({ state: "OPEN", failures: 2 });

    circuitBreaker(name).reset();
  });
});

describe("withTimeout", () => {
  it("時間内に終われば結果を返す", async () => {
    await expect(withTimeout(async () => "done", 1000, "timeout-ok")).resolves.toBe("done");
  });

  it("時間切れは code=ETIMEDOUT のエラー", async () => {
    const error = await withTimeout(
      () => new Promise((resolve) => setTimeout(resolve, 100)),
      10,
      "timeout-slow"
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: "Timeout after 10ms: timeout-slow", code: "ETIMEDOUT" });
  });
});

describe("withRetryAndTimeout", () => {
  it("時間切れになった試行は再試行する", async () => {
    let attempts = 0;

    const result = await withRetryAndTimeout(
      async () => {
        attempts++;
        if (attempts === 1) {
          await new Promise((resolve) => setTimeout(resolve, 50));
        }
        return "second try";
      },
      { name: "retry-timeout", timeoutMs: 10, retryConfig: { maxRetries: 1, ...FAST_RETRY } }
    );

    expect(result).toBe("second try");
    expect(attempts).toBe(2);
  });
});

describe("CircuitBreaker", () => {
  const CONFIG = { failureThreshold: 2, resetTimeoutMs: 1000, halfOpenRequests: 1 };

  it("連続失敗が閾値に達すると OPEN になり、成功で失敗数は戻る", () => {
    const breaker = new CircuitBreaker("breaker-threshold", CONFIG, () => 0);

    breaker.recordFailure();
    breaker.recordSuccess();
    breaker.recordFailure();
    expect(breaker.status()).toEqual({ state: "CLOSED", failures: 1 });

    breaker.recordFailure();
    expect(breaker.status()).toEqual({ state: "OPEN", failures: 2 });
    expect(breaker.tryAcquire()).toBe(false);
  });

  it("待機時間の後は HALF_OPEN で試行枠だけ通し、成功すれば CLOSED", () => {
    let now = 5000;
    const breaker = new CircuitBreaker("breaker-recover", CONFIG, () => now);
    breaker.recordFailure();
    breaker.recordFailure();

    now += 999;
    expect(breaker.tryAcquire()).toBe(false);

    now += 1;
    expect(breaker.tryAcquire()).toBe(true);
    expect(breaker.status().state).toBe("HALF_OPEN");
    expect(breaker.tryAcquire()).toBe(false);

    breaker.recordSuccess();
    expect(breaker.status()).toEqual({ state: "CLOSED", failures: 0 });
  });

  it("HALF_OPEN での失敗は OPEN に戻す", () => {
    let now = 0;
    const breaker = new CircuitBreaker("breaker-reopen", CONFIG, () => now);
    breaker.recordFailure();
    breaker.recordFailure();

    now = 1000;
    expect(breaker.tryAcquire()).toBe(true);
    breaker.recordFailure();

    expect(breaker.status().state).toBe("OPEN");
    expect(breaker.tryAcquire()).toBe(false);
  });
});
