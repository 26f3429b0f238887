/**
 * Google Ads API クライアント
 *
 * REST (googleAds:search / adGroupCriteria:mutate) で
 * クリック識別子の解決・有効キーワードの取得・入札変更を行う
 *
 * - OAuth リフレッシュトークンでアクセストークンを取得（期限前にキャッシュ更新）
 * - Circuit Breaker付きリトライ（429はバックオフ、401/403はリトライなし）
 * - 応答は zod スキーマで検証
 */

import { CampaignDirectory, EnabledKeyword } from "./attribution/types";
import { BidChange, ChangeApplier } from "./apply/types";
import { GoogleAdsConfig } from "./config";
import { GOOGLE_ADS_API } from "./constants";
import { AuthenticationError, GoogleAdsApiError, GoogleAdsErrorInfo, ValidationError } from "./errors";
import { logger } from "./logger";
import {
  GoogleAdsErrorResponseSchema,
  GoogleAdsMutateResponse,
  GoogleAdsMutateResponseSchema,
  GoogleAdsRow,
  GoogleAdsSearchResponseSchema,
  GoogleOAuthTokenResponseSchema,
} from "./schemas/external-api";
import { CircuitBreakerConfig, RetryConfig, withRetryAndTimeout } from "./utils/retry";

// =============================================================================
// 型定義
// =============================================================================

export interface GoogleAdsClientOptions {
  retryConfig?: Partial<RetryConfig>;
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>;
  timeoutMs?: number;
}

interface MutateOperation {
  update: {
    resourceName: string;
    cpcBidMicros: string;
  };
  updateMask: string;
}

const CIRCUIT_BREAKER_NAME = "google-ads-api";

// =============================================================================
// GAQL ヘルパー
// =============================================================================

/**
 * GAQL の文字列リテラル
 */
export function quoteGaqlString(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

/**
 * GAQL に埋め込む数値ID（数字以外は拒否）
 */
export function assertNumericId(value: string, field: string): string {
  if (!/^\d+$/.test(value)) {
    throw new ValidationError([{ field, message: `${field} must contain digits only`, received: value }]);
  }
  return value;
}

/**
 * エラー応答の本文から gRPC ステータスとメッセージを取り出す
 *
 * JSON でない本文はそのままメッセージにする
 */
export function parseErrorBody(httpStatus: number, body: string, requestId?: string): GoogleAdsErrorInfo {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return { httpStatus, apiMessage: body || undefined, requestId };
  }
  const parsed = GoogleAdsErrorResponseSchema.safeParse(json);
  if (!parsed.success) {
    return { httpStatus, apiMessage: body || undefined, requestId };
  }
  return {
    httpStatus,
    apiStatus: parsed.data.error.status,
    apiMessage: parsed.data.error.message,
    requestId,
  };
}

/**
 * GAQL に埋め込む日付（YYYY-MM-DD 以外は拒否）
 */
export function quoteGaqlDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new ValidationError([
      { field: "clickDate", message: "clickDate must be YYYY-MM-DD", received: value },
    ]);
  }
  return `'${value}'`;
}

/**
 * micros → 通貨単位
 */
export function fromMicros(micros: number): number {
  return micros / GOOGLE_ADS_API.MICROS_PER_UNIT;
}

/**
 * 通貨単位 → micros（整数に丸める）
 */
export function toMicros(amount: number): number {
  return Math.round(amount * GOOGLE_ADS_API.MICROS_PER_UNIT);
}

/**
 * ad_group_criterion のリソース名
 */
export function adGroupCriterionResourceName(
  customerId: string,
  adGroupId: string,
  criterionId: string
): string {
  return `customers/${customerId}/adGroupCriteria/${adGroupId}~${criterionId}`;
}

// =============================================================================
// クライアント
// =============================================================================

export class GoogleAdsClient {
  private cachedAccessToken: string | null = null;
  private tokenExpiresAt = 0;

  constructor(
    private readonly config: GoogleAdsConfig,
    private readonly options: GoogleAdsClientOptions = {}
  ) {}

  get customerId(): string {
    return this.config.customerId;
  }

  /**
   * アクセストークンを取得
   * 認証エラーはリトライ不可として扱う
   */
  async getAccessToken(): Promise<string> {
    if (this.cachedAccessToken && Date.now() < this.tokenExpiresAt) {
      return this.cachedAccessToken;
    }

    logger.info("Refreshing Google Ads API access token");

    const params = new URLSearchParams({
      grant_type: "refresh_token",
      refresh_token: this.config.refreshToken,
      client_id: this.config.clientId,
      client_secret: this.config.clientSecret,
    });

    const response = await fetch(GOOGLE_ADS_API.TOKEN_URL, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: params.toString(),
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error("Failed to obtain access token", {
        status: response.status,
        error: errorText,
      });

      if (response.status === 400 || response.status === 401 || response.status === 403) {
        throw new AuthenticationError(`Google OAuth token refresh failed: ${response.status}`, {
          responseBody: errorText,
        });
      }
      throw GoogleAdsApiError.fromResponse(parseErrorBody(response.status, errorText));
    }

    const parsed = GoogleOAuthTokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new AuthenticationError("Google OAuth token response is malformed");
    }

    this.cachedAccessToken = parsed.data.access_token;
    this.tokenExpiresAt =
      Date.now() + (parsed.data.expires_in - GOOGLE_ADS_API.TOKEN_CACHE_BUFFER_SECONDS) * 1000;

    logger.info("Access token refreshed successfully");
    return parsed.data.access_token;
  }

  /**
   * Google Ads API にリクエストを送信（エラー分類付き）
   * Circuit Breaker と リトライ を内部で適用
   */
  private async request(path: string, body: unknown): Promise<unknown> {
    return withRetryAndTimeout(
      async () => {
        const accessToken = await this.getAccessToken();
        const url = `${this.config.baseUrl}/${this.config.apiVersion}/customers/${this.config.customerId}/${path}`;

        const headers: Record<string, string> = {
          Authorization: `Bearer ${accessToken}`,
          "developer-token": this.config.developerToken,
          "Content-Type": "application/json",
        };
        if (this.config.loginCustomerId) {
          headers["login-customer-id"] = this.config.loginCustomerId;
        }

        logger.debug("Making Google Ads API request", { path });

        const response = await fetch(url, {
          method: "POST",
          headers,
          body: JSON.stringify(body),
        });
        const googleAdsRequestId = response.headers.get("request-id") ?? undefined;

        if (!response.ok) {
          const errorText = await response.text();
          logger.error("Google Ads API request failed", {
            path,
            status: response.status,
            error: errorText,
            googleAdsRequestId,
          });
          if (response.status === 401) {
            // 期限切れトークンを次の試行で取り直す
            this.cachedAccessToken = null;
          }
          throw GoogleAdsApiError.fromResponse(
            parseErrorBody(response.status, errorText, googleAdsRequestId)
          );
        }

        return response.json();
      },
      {
        name: CIRCUIT_BREAKER_NAME,
        timeoutMs: this.options.timeoutMs ?? GOOGLE_ADS_API.REQUEST_TIMEOUT_MS,
        retryConfig: {
          maxRetries: 3,
          baseDelayMs: 1000,
          maxDelayMs: 60000,
          ...this.options.retryConfig,
        },
        circuitBreakerConfig: {
          failureThreshold: 5,
          resetTimeoutMs: 60000,
          halfOpenRequests: 2,
          ...this.options.circuitBreakerConfig,
        },
      }
    );
  }

  /**
   * GAQL を実行し、全ページの行を返す
   */
  async search(query: string): Promise<GoogleAdsRow[]> {
    const rows: GoogleAdsRow[] = [];
    let pageToken: string | undefined;

    do {
      const raw = await this.request("googleAds:search", pageToken ? { query, pageToken } : { query });
      const parsed = GoogleAdsSearchResponseSchema.safeParse(raw);
      if (!parsed.success) {
        throw new GoogleAdsApiError({
          message: `Unexpected googleAds:search response: ${parsed.error.message}`,
          statusCode: 502,
        });
      }
      rows.push(...parsed.data.results);
      pageToken = parsed.data.nextPageToken || undefined;
    } while (pageToken);

    logger.debug("GAQL search completed", { rowCount: rows.length });
    return rows;
  }

  /**
   * 広告グループ条件（キーワード）を更新
   */
  async mutateAdGroupCriteria(operations: MutateOperation[]): Promise<GoogleAdsMutateResponse> {
    const raw = await this.request("adGroupCriteria:mutate", { operations });
    const parsed = GoogleAdsMutateResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new GoogleAdsApiError({
        message: `Unexpected adGroupCriteria:mutate response: ${parsed.error.message}`,
        statusCode: 502,
      });
    }
    if (parsed.data.partialFailureError) {
      throw new GoogleAdsApiError({
        message: `Google Ads mutate partially failed: ${parsed.data.partialFailureError.message ?? "unknown"}`,
        statusCode: 400,
      });
    }
    return parsed.data;
  }
}

// =============================================================================
// CampaignDirectory 実装
// =============================================================================

/**
 * Google Ads をキャンペーン情報の参照先とする CampaignDirectory
 *
 * click_view は gclid のみ検索できるため、gbraid はここでは解決されず
 * 呼び出し側で Unmapped になる。
 * click_view は segments.date の単日指定が必須のため、クリック日のない識別子は問い合わせない
 */
export class GoogleAdsCampaignDirectory implements CampaignDirectory {
  constructor(private readonly client: GoogleAdsClient) {}

  private hasQueryableDate(clickDate: string | null, batchSize: number): clickDate is string {
    if (clickDate === null) {
      logger.debug("Skipping click_view lookup for identifiers without click date", { batchSize });
      return false;
    }
    return true;
  }

  async resolveIdentifiers(
    campaignId: string,
    batch: readonly string[],
    clickDate: string | null
  ): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    if (batch.length === 0 || !this.hasQueryableDate(clickDate, batch.length)) {
      return result;
    }

    const rows = await this.client.search(
      `SELECT click_view.gclid, click_view.keyword_info.text FROM click_view ` +
        `WHERE campaign.id = ${assertNumericId(campaignId, "campaignId")} ` +
        `AND segments.date = ${quoteGaqlDate(clickDate)} ` +
        `AND click_view.gclid IN (${batch.map(quoteGaqlString).join(", ")})`
    );

    for (const row of rows) {
      const gclid = row.clickView?.gclid;
      const text = row.clickView?.keywordInfo?.text;
      if (gclid && text && !result.has(gclid)) {
        result.set(gclid, text);
      }
    }
    return result;
  }

  async resolveAdGroupAds(
    campaignId: string,
    batch: readonly string[],
    clickDate: string | null
  ): Promise<Map<string, string>> {
    const result = new Map<string, string>();
    if (batch.length === 0 || !this.hasQueryableDate(clickDate, batch.length)) {
      return result;
    }

    const rows = await this.client.search(
      `SELECT click_view.gclid, click_view.ad_group_ad FROM click_view ` +
        `WHERE campaign.id = ${assertNumericId(campaignId, "campaignId")} ` +
        `AND segments.date = ${quoteGaqlDate(clickDate)} ` +
        `AND click_view.gclid IN (${batch.map(quoteGaqlString).join(", ")})`
    );

    for (const row of rows) {
      const gclid = row.clickView?.gclid;
      const adGroupAd = row.clickView?.adGroupAd;
      if (gclid && adGroupAd && !result.has(gclid)) {
        result.set(gclid, adGroupAd);
      }
    }
    return result;
  }

  async listAdGroupKeywords(
    campaignId: string,
    adGroupIds: readonly string[]
  ): Promise<Map<string, string[]>> {
    const result = new Map<string, string[]>();
    if (adGroupIds.length === 0) {
      return result;
    }

    const ids = adGroupIds.map((id) => assertNumericId(id, "adGroupId"));
    const rows = await this.client.search(
      `SELECT ad_group.id, ad_group_criterion.keyword.text FROM ad_group_criterion ` +
        `WHERE campaign.id = ${assertNumericId(campaignId, "campaignId")} ` +
        `AND ad_group.id IN (${ids.join(", ")}) ` +
        `AND ad_group_criterion.type = 'KEYWORD' ` +
        `AND ad_group_criterion.status = 'ENABLED'`
    );

    for (const row of rows) {
      const adGroupId = row.adGroup?.id;
      const text = row.adGroupCriterion?.keyword?.text;
      if (!adGroupId || !text) {
        continue;
      }
      const texts = result.get(adGroupId) ?? [];
      texts.push(text);
      result.set(adGroupId, texts);
    }
    return result;
  }

  async listEnabledKeywords(campaignId: string): Promise<EnabledKeyword[]> {
    const rows = await this.client.search(
      `SELECT ad_group.id, ad_group_criterion.criterion_id, ad_group_criterion.keyword.text, ` +
        `ad_group_criterion.effective_cpc_bid_micros FROM ad_group_criterion ` +
        `WHERE campaign.id = ${assertNumericId(campaignId, "campaignId")} ` +
        `AND ad_group_criterion.type = 'KEYWORD' ` +
        `AND ad_group_criterion.status = 'ENABLED' ` +
        `AND ad_group.status = 'ENABLED'`
    );

    const keywords: EnabledKeyword[] = [];
    for (const row of rows) {
      const adGroupId = row.adGroup?.id;
      const criterion = row.adGroupCriterion;
      const text = criterion?.keyword?.text;
      if (!adGroupId || !criterion?.criterionId || !text) {
        continue;
      }
      const bidMicros = criterion.effectiveCpcBidMicros ?? criterion.cpcBidMicros ?? 0;
      keywords.push({
        criterionId: criterion.criterionId,
        adGroupId,
        text,
        currentBid: fromMicros(bidMicros),
      });
    }

    logger.debug("Enabled keywords listed", { campaignId, count: keywords.length });
    return keywords;
  }
}

// =============================================================================
// ChangeApplier 実装
// =============================================================================

/**
 * adGroupCriteria:mutate で cpc_bid_micros を更新する ChangeApplier
 */
export class GoogleAdsChangeApplier implements ChangeApplier {
  constructor(private readonly client: GoogleAdsClient) {}

  async apply(change: BidChange): Promise<void> {
    const resourceName = adGroupCriterionResourceName(
      this.client.customerId,
      assertNumericId(change.adGroupId, "adGroupId"),
      assertNumericId(change.criterionId, "criterionId")
    );

    await this.client.mutateAdGroupCriteria([
      {
        update: {
          resourceName,
          cpcBidMicros: String(toMicros(change.newBid)),
        },
        updateMask: "cpc_bid_micros",
      },
    ]);

    logger.info("Keyword bid updated", {
      resourceName,
      keywordText: change.keywordText,
      oldBid: change.oldBid,
      newBid: change.newBid,
      reason: change.reason,
    });
  }
}
