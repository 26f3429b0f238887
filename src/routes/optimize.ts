/**
 * 最適化実行エンドポイント
 *
 * Cloud Scheduler などから POST /cron/run-optimization で起動される
 */

import { Router, Request, Response } from "express";
import { ApiResponse, ApiResponseBuilder, ValidationError, toAppError } from "../errors";
import { logger } from "../logger";
import { OptimizationOutcome, OptimizationRequest } from "../optimizer/types";
import { OptimizationRequestSchema } from "../schemas";

/**
 * 検証済みリクエストで最適化を1回実行する関数
 */
export type OptimizationRunner = (request: OptimizationRequest) => Promise<OptimizationOutcome>;

export interface OptimizationResponseBody {
  runId: string;
  reportPersisted: boolean;
  report: OptimizationOutcome["report"];
}

/**
 * リクエスト本文を検証して最適化を実行し、統一レスポンスを返す
 */
export async function handleOptimizationRequest(
  body: unknown,
  runner: OptimizationRunner,
  traceId?: string
): Promise<ApiResponse<OptimizationResponseBody>> {
  const parsed = OptimizationRequestSchema.safeParse(body);
  if (!parsed.success) {
    const error = ValidationError.fromZodError(parsed.error);
    logger.warn("Invalid optimization request", { traceId, errors: error.errors });
    return ApiResponseBuilder.error(error, traceId);
  }

  try {
    const outcome = await runner(parsed.data);
    return ApiResponseBuilder.success(
      {
        runId: outcome.run.runId,
        reportPersisted: outcome.reportPersisted,
        report: outcome.report,
      },
      { requestId: traceId }
    );
  } catch (error) {
    const appError = toAppError(error);
    logger.error("Optimization run failed", {
      traceId,
      campaignId: parsed.data.campaignId,
      code: appError.code,
      error: appError.message,
    });
    return ApiResponseBuilder.error(appError, traceId);
  }
}

/**
 * 最適化ルーターを作成
 */
export function createOptimizeRoutes(runner: OptimizationRunner): Router {
  const router = Router();

  router.post("/run-optimization", async (req: Request, res: Response) => {
    const traceId = typeof res.locals.traceId === "string" ? res.locals.traceId : undefined;
    const response = await handleOptimizationRequest(req.body, runner, traceId);
    res.status(response.statusCode).json(response);
  });

  return router;
}
