/**
 * キーワード入札最適化エンジン - バリデーションスキーマ
 */

import { z } from "zod";
import { OPTIMIZATION_DEFAULTS } from "./constants";

// =============================================================================
// 基本型のスキーマ
// =============================================================================

export const OptimizationStrategySchema = z.enum(["ROAS", "CPA", "MANUAL"]);

export const ResolutionStrategySchema = z.enum(["DIRECT", "TWO_HOP"]);

export const TriggerSourceSchema = z.enum(["CRON", "API", "MANUAL"]);

/**
 * キャンペーンID（数字のみ。数値で渡された場合も文字列に揃える）
 */
export const CampaignIdSchema = z
  .union([z.string(), z.number().int().nonnegative()])
  .transform(String)
  .pipe(z.string().trim().regex(/^\d+$/, "campaignId must contain digits only"));

// =============================================================================
// 最適化リクエスト スキーマ
// =============================================================================

export const OptimizationRequestSchema = z.object({
  campaignId: CampaignIdSchema,
  strategy: OptimizationStrategySchema,
  maxCpa: z.number().positive("maxCpa must be positive"),
  minConversionRate: z
    .number()
    .min(0)
    .max(1, "minConversionRate must be between 0 and 1")
    .default(0),
  attributionWindowDays: z
    .number()
    .int()
    .min(1)
    .max(
      OPTIMIZATION_DEFAULTS.MAX_ATTRIBUTION_WINDOW_DAYS,
      `attributionWindowDays must be at most ${OPTIMIZATION_DEFAULTS.MAX_ATTRIBUTION_WINDOW_DAYS}`
    )
    .default(OPTIMIZATION_DEFAULTS.ATTRIBUTION_WINDOW_DAYS),
  /** 未指定なら環境変数 RESOLUTION_STRATEGY に従う */
  resolutionStrategy: ResolutionStrategySchema.optional(),
  triggerSource: TriggerSourceSchema.default("API"),
});

export type OptimizationRequestInput = z.input<typeof OptimizationRequestSchema>;
