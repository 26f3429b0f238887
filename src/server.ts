/**
 * キーワード入札最適化エンジン - APIサーバー
 *
 * エントリポイント: startServer() を呼び出してHTTPサーバーを起動
 */

// dotenv を最初に読み込んで .env ファイルから環境変数を設定
import "dotenv/config";

import express, { Express, Request, Response, NextFunction } from "express";
import rateLimit from "express-rate-limit";
import { loadApplySafetyConfig, logApplySafetyConfigOnStartup } from "./apply";
import { EnvConfig, loadEnvConfig, validateEnvConfig } from "./config";
import { SERVER } from "./constants";
import { ApiResponseBuilder, ConfigurationError, errorMessage, RateLimitError } from "./errors";
import { GoogleAdsCampaignDirectory, GoogleAdsChangeApplier, GoogleAdsClient } from "./googleAdsClient";
import { logger } from "./logger";
import { getExecutionMode, logExecutionModeOnStartup } from "./logging";
import { apiKeyAuth } from "./middleware/auth";
import { OptimizationSettings, runOptimization } from "./optimizer";
import { BigQueryReportSink } from "./report";
import { createOptimizeRoutes, healthRoutes, OptimizationRunner } from "./routes";
import { BigQueryTrafficSource } from "./traffic";

// =============================================================================
// 依存関係の組み立て
// =============================================================================

/**
 * 環境設定から実行設定を作る
 */
export function buildOptimizationSettings(envConfig: EnvConfig): OptimizationSettings {
  return {
    mode: getExecutionMode(),
    conversionKinds: envConfig.conversionKinds,
    resolutionStrategy: envConfig.resolutionStrategy,
    resolverBatchSize: envConfig.resolverBatchSize,
    resolverConcurrency: envConfig.resolverConcurrency,
    accountTimeZone: envConfig.accountTimeZone,
    bidStepRatio: envConfig.bidStepRatio,
    applySafety: loadApplySafetyConfig(),
  };
}

/**
 * 本番用のコラボレーターで最適化ランナーを作る
 */
export function createOptimizationRunner(envConfig: EnvConfig): OptimizationRunner {
  const googleAds = new GoogleAdsClient(envConfig.googleAds);
  const deps = {
    trafficSource: new BigQueryTrafficSource({
      projectId: envConfig.bigqueryProjectId,
      dataset: envConfig.bigqueryDatasetId,
      location: envConfig.bigqueryLocation,
    }),
    campaignDirectory: new GoogleAdsCampaignDirectory(googleAds),
    changeApplier: new GoogleAdsChangeApplier(googleAds),
    reportSink: new BigQueryReportSink({
      projectId: envConfig.bigqueryProjectId,
      dataset: envConfig.bigqueryDatasetId,
    }),
  };
  const settings = buildOptimizationSettings(envConfig);

  logExecutionModeOnStartup(settings.mode);
  logApplySafetyConfigOnStartup(settings.applySafety);

  return (request) => runOptimization(request, deps, settings);
}

/**
 * 設定が読めなかった場合のランナー（集計を始める前に設定エラーを返す）
 */
function createUnconfiguredRunner(error: ConfigurationError): OptimizationRunner {
  return () => Promise.reject(error);
}

// =============================================================================
// Express app
// =============================================================================

export interface AppOptions {
  apiKey?: string;
  runner: OptimizationRunner;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // ===========================================================================
  // ミドルウェア
  // ===========================================================================

  app.use(express.json({ limit: "1mb" }));

  // リクエストログ
  app.use(logger.requestLogger());

  // レート制限（API全体）
  const generalLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1分間
    max: 100, // 100リクエスト/分
    message: ApiResponseBuilder.error(new RateLimitError(60000, "Too many requests, please try again later.")),
    standardHeaders: true,
    legacyHeaders: false,
  });

  // 最適化実行用の厳しいレート制限
  const runLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1分間
    max: 10, // 10リクエスト/分
    message: ApiResponseBuilder.error(new RateLimitError(60000, "Too many optimization runs, please try again later.")),
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(generalLimiter);

  // ===========================================================================
  // ルーターの登録
  // ===========================================================================

  // ヘルスチェック（認証なし）
  app.use("/", healthRoutes);

  // Cronエンドポイント（API Key認証 + 実行用レート制限）
  app.use("/cron", apiKeyAuth(options.apiKey), runLimiter, createOptimizeRoutes(options.runner));

  // エラーハンドリング
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled error", {
      error: err.message,
      stack: err.stack,
      path: req.path,
    });
    const response = ApiResponseBuilder.error(err);
    res.status(response.statusCode).json(response);
  });

  return app;
}

// =============================================================================
// サーバー起動関数
// =============================================================================

/**
 * HTTPサーバーを起動する
 *
 * @returns Promise<void> - サーバー起動完了後にresolve（プロセスは終了しない）
 */
export async function startServer(): Promise<void> {
  // 環境変数の検証
  const envValidation = validateEnvConfig();
  if (!envValidation.valid) {
    logger.error("Environment validation failed", { errors: envValidation.errors });
    // 開発環境では警告のみ、本番では起動を停止
    if (process.env.NODE_ENV === "production") {
      throw new ConfigurationError(
        `Environment validation failed: ${envValidation.errors.join(", ")}`
      );
    }
  }

  let runner: OptimizationRunner;
  let apiKey: string | undefined = process.env.API_KEY || undefined;
  try {
    const envConfig = loadEnvConfig();
    apiKey = envConfig.apiKey;
    runner = createOptimizationRunner(envConfig);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger.warn("Optimization disabled until configuration is complete", {
      missingConfig: error.missingConfig,
    });
    runner = createUnconfiguredRunner(error);
  }

  const app = createApp({ apiKey, runner });
  const port = parseInt(process.env.PORT || String(SERVER.DEFAULT_PORT), 10);

  return new Promise<void>((resolve) => {
    app.listen(port, () => {
      logger.info("Server started", {
        port,
        environment: process.env.NODE_ENV || "development",
        authEnabled: !!apiKey,
        rateLimitEnabled: true,
      });
      resolve();
    });
  });
}

// =============================================================================
// エントリポイント
// =============================================================================

if (require.main === module) {
  startServer().catch((error) => {
    logger.error("Failed to start server", {
      environment: process.env.NODE_ENV || "development",
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exit(1);
  });
}
