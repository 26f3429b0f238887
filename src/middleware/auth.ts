/**
 * キーワード入札最適化エンジン - 認証ミドルウェア
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { ApiResponseBuilder } from "../errors";
import { logger } from "../logger";

/**
 * Authorization: Bearer <token> からトークンを取り出す
 */
export function extractBearerToken(authHeader: string | undefined): string | undefined {
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    return undefined;
  }
  const token = authHeader.substring(7).trim();
  return token.length > 0 ? token : undefined;
}

/**
 * 認証に使うリクエストの部分
 */
export interface AuthRequest {
  header(name: string): string | undefined;
  ip?: string;
  path: string;
}

/**
 * 認証に使うレスポンスの部分
 */
export interface AuthResponse {
  locals: Record<string, unknown>;
  status(code: number): { json(body: unknown): unknown };
}

/**
 * API Keyを検証し、通過すれば next を呼ぶ（拒否時は 401 を返す）
 */
export function authorizeApiKey(
  apiKey: string | undefined,
  req: AuthRequest,
  res: AuthResponse,
  next: () => void
): void {
  if (!apiKey) {
    // API Keyが設定されていない場合は認証をスキップ
    logger.warn("API Key authentication is disabled (API_KEY not set)");
    next();
    return;
  }

  const traceId = typeof res.locals.traceId === "string" ? res.locals.traceId : undefined;
  const providedKey =
    req.header("x-api-key") || extractBearerToken(req.header("authorization"));

  if (!providedKey) {
    res
      .status(401)
      .json(
        ApiResponseBuilder.unauthorized(
          "API key is required. Provide via X-API-Key header or Authorization: Bearer <key>",
          traceId
        )
      );
    return;
  }

  if (providedKey !== apiKey) {
    logger.warn("Invalid API key attempt", {
      ip: req.ip,
      path: req.path,
    });
    res.status(401).json(ApiResponseBuilder.unauthorized("Invalid API key", traceId));
    return;
  }

  next();
}

/**
 * API Key認証ミドルウェア
 * ヘッダー: X-API-Key または Authorization: Bearer <api_key>
 */
export function apiKeyAuth(apiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    authorizeApiKey(apiKey, req, res, () => next());
  };
}
