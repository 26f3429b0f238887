/**
 * 外部API応答のZodスキーマ定義
 *
 * Google Ads REST API, BigQueryの応答を型安全に検証する
 */

import { z } from "zod";

// =============================================================================
// 共通
// =============================================================================

/**
 * Google Ads REST の int64 は文字列で返る
 */
const Int64Schema = z
  .union([z.string(), z.number()])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const IdSchema = z.union([z.string(), z.number()]).transform(String);

// =============================================================================
// Google Ads API スキーマ
// =============================================================================

/**
 * OAuth トークン応答
 */
export const GoogleOAuthTokenResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.string(),
  expires_in: z.number(),
  scope: z.string().optional(),
});

export type GoogleOAuthTokenResponse = z.infer<typeof GoogleOAuthTokenResponseSchema>;

/**
 * googleAds:search の1行
 *
 * 問い合わせたフィールドだけが返るので全てオプショナル
 */
export const GoogleAdsRowSchema = z.object({
  clickView: z
    .object({
      gclid: z.string().optional(),
      adGroupAd: z.string().optional(),
      keywordInfo: z
        .object({
          text: z.string().optional(),
          matchType: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
  adGroup: z
    .object({
      id: IdSchema.optional(),
    })
    .optional(),
  adGroupCriterion: z
    .object({
      criterionId: IdSchema.optional(),
      status: z.string().optional(),
      keyword: z
        .object({
          text: z.string().optional(),
          matchType: z.string().optional(),
        })
        .optional(),
      effectiveCpcBidMicros: Int64Schema.optional(),
      cpcBidMicros: Int64Schema.optional(),
    })
    .optional(),
});

export type GoogleAdsRow = z.infer<typeof GoogleAdsRowSchema>;

export const GoogleAdsSearchResponseSchema = z.object({
  results: z.array(GoogleAdsRowSchema).default([]),
  nextPageToken: z.string().optional(),
  fieldMask: z.string().optional(),
});

export type GoogleAdsSearchResponse = z.infer<typeof GoogleAdsSearchResponseSchema>;

/**
 * adGroupCriteria:mutate 応答
 */
export const GoogleAdsMutateResponseSchema = z.object({
  results: z
    .array(
      z.object({
        resourceName: z.string(),
      })
    )
    .default([]),
  partialFailureError: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

export type GoogleAdsMutateResponse = z.infer<typeof GoogleAdsMutateResponseSchema>;

/**
 * エラー応答（google.rpc.Status）
 */
export const GoogleAdsErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    status: z.string().optional(),
  }),
});

// =============================================================================
// BigQuery 応答スキーマ
// =============================================================================

/**
 * BigQuery の NUMERIC / TIMESTAMP は { value } ラッパーで返ることがある
 */
const BigQueryWrappedValueSchema = z.object({ value: z.string() });

const BigQueryNumberSchema = z
  .union([z.number(), z.string(), BigQueryWrappedValueSchema])
  .transform((value) => {
    const raw = typeof value === "object" ? value.value : value;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : null;
  });

const BigQueryTimestampSchema = z
  .union([z.date(), z.string(), BigQueryWrappedValueSchema])
  .transform((value) => {
    const date =
      value instanceof Date ? value : new Date(typeof value === "object" ? value.value : value);
    return Number.isNaN(date.getTime()) ? null : date;
  });

/**
 * BigQuery クリックログ行
 */
export const BigQueryClickRowSchema = z.object({
  record_id: z.union([z.string(), z.number()]).transform(String).nullable().optional(),
  clicked_at: BigQueryTimestampSchema.nullable().optional(),
  destination_url: z.string().nullable().optional(),
  conversion_kind: z.string().nullable().optional(),
  cost: BigQueryNumberSchema.nullable().optional(),
  paid_source: z.union([z.boolean(), z.string()]).nullable().optional(),
});

export type BigQueryClickRow = z.infer<typeof BigQueryClickRowSchema>;

// =============================================================================
// 配列検証ヘルパー
// =============================================================================

/**
 * 配列を安全にパース
 */
export function safeParseArray<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown[],
  options?: { skipInvalid?: boolean }
): { valid: T[]; invalid: { index: number; error: z.ZodError }[] } {
  const valid: T[] = [];
  const invalid: { index: number; error: z.ZodError }[] = [];

  for (let i = 0; i < data.length; i++) {
    const result = schema.safeParse(data[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      invalid.push({ index: i, error: result.error });
      if (!options?.skipInvalid) {
        break; // デフォルトでは最初のエラーで停止
      }
    }
  }

  return { valid, invalid };
}
