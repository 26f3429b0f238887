/**
 * IdentityResolver - クリック識別子をキーワードへ解決する
 *
 * 外部クエリ1回あたりの識別子数には上限（50件）があるため、
 * 識別子をバッチに分割して1バッチ1回の外部呼び出しを行う。
 * クリックの参照は日単位でしか問い合わせられないため、バッチはクリック日ごとに作る。
 *
 * 解決方式:
 * - DIRECT:  識別子 → キーワードテキスト（1クエリ）
 * - TWO_HOP: 識別子 → adGroupAd リソース名 → 広告グループ → キーワードテキスト（2クエリ）
 *
 * 失敗したバッチの識別子は Unmapped(<識別子>) に落とし、他のバッチは続行する。
 * 結果のマッピングは要求された全識別子を必ず含む。
 */

import { RESOLVER } from "../constants";
import { errorMessage } from "../errors";
import { logger as rootLogger, StructuredLogger } from "../logger";
import { parseAdGroupAdResourceName } from "./resource-name";
import {
  CampaignDirectory,
  ClickIdentifier,
  ClickOccurrence,
  IdentityResolutionResult,
  IdentityResolverOptions,
  ResolutionBatchOutcome,
  ResolutionStrategy,
  ResolvedKeyword,
  unmappedLabel,
} from "./types";

// =============================================================================
// ヘルパー（純粋関数）
// =============================================================================

/**
 * 空の識別子を除外し、出現順を保って重複を取り除く
 */
export function dedupeIdentifiers(identifiers: Iterable<string>): ClickIdentifier[] {
  const seen = new Set<string>();
  const result: ClickIdentifier[] = [];
  for (const identifier of identifiers) {
    if (identifier.length === 0 || seen.has(identifier)) {
      continue;
    }
    seen.add(identifier);
    result.push(identifier);
  }
  return result;
}

/**
 * 固定サイズのバッチに分割
 */
export function chunkIdentifiers<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer: ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export interface ResolutionBatch {
  index: number;
  clickDate: string | null;
  identifiers: ClickIdentifier[];
}

/**
 * クリックを日付ごとにまとめてからバッチに分割
 *
 * 識別子の重複は最初の出現を採用する。日付は最初に現れた順、
 * 日付内の識別子は出現順に並ぶ
 */
export function planResolutionBatches(
  clicks: Iterable<ClickOccurrence>,
  size: number
): ResolutionBatch[] {
  const seen = new Set<ClickIdentifier>();
  const byDate = new Map<string | null, ClickIdentifier[]>();
  for (const { identifier, clickDate } of clicks) {
    if (identifier.length === 0 || seen.has(identifier)) {
      continue;
    }
    seen.add(identifier);
    const group = byDate.get(clickDate);
    if (group) {
      group.push(identifier);
    } else {
      byDate.set(clickDate, [identifier]);
    }
  }

  const batches: ResolutionBatch[] = [];
  for (const [clickDate, identifiers] of byDate) {
    for (const chunk of chunkIdentifiers(identifiers, size)) {
      batches.push({ index: batches.length, clickDate, identifiers: chunk });
    }
  }
  return batches;
}

function normalizeBatchSize(batchSize: number | undefined): number {
  if (batchSize === undefined || !Number.isFinite(batchSize)) {
    return RESOLVER.MAX_BATCH_SIZE;
  }
  return Math.min(Math.max(1, Math.floor(batchSize)), RESOLVER.MAX_BATCH_SIZE);
}

function normalizeConcurrency(concurrency: number | undefined): number {
  if (concurrency === undefined || !Number.isFinite(concurrency)) {
    return RESOLVER.DEFAULT_CONCURRENCY;
  }
  return Math.min(Math.max(1, Math.floor(concurrency)), RESOLVER.MAX_CONCURRENCY);
}

// =============================================================================
// IdentityResolver
// =============================================================================

interface BatchResult {
  outcome: ResolutionBatchOutcome;
  resolved: Map<ClickIdentifier, ResolvedKeyword>;
}

export class IdentityResolver {
  private readonly strategy: ResolutionStrategy;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly log: StructuredLogger;

  constructor(
    private readonly directory: CampaignDirectory,
    options: IdentityResolverOptions,
    log: StructuredLogger = rootLogger
  ) {
    this.strategy = options.strategy;
    this.batchSize = normalizeBatchSize(options.batchSize);
    this.concurrency = normalizeConcurrency(options.concurrency);
    this.log = log;
  }

  getBatchSize(): number {
    return this.batchSize;
  }

  /**
   * 識別子一覧をキーワードへ解決
   *
   * バッチの完了順は結果に影響しない（バッチ順にマージする）
   */
  async resolve(
    campaignId: string,
    clicks: Iterable<ClickOccurrence>
  ): Promise<IdentityResolutionResult> {
    const batches = planResolutionBatches(clicks, this.batchSize);
    const unique = batches.flatMap((batch) => batch.identifiers);

    this.log.info("Resolving click identifiers", {
      campaignId,
      strategy: this.strategy,
      identifierCount: unique.length,
      clickDateCount: new Set(batches.map((batch) => batch.clickDate)).size,
      batchCount: batches.length,
      batchSize: this.batchSize,
      concurrency: this.concurrency,
    });

    const results: BatchResult[] = new Array(batches.length);
    for (let start = 0; start < batches.length; start += this.concurrency) {
      const wave = batches.slice(start, start + this.concurrency);
      const waveResults = await Promise.all(wave.map((batch) => this.resolveBatch(campaignId, batch)));
      waveResults.forEach((result, offset) => {
        results[start + offset] = result;
      });
    }

    // 要求された全識別子をマッピングに含める
    const mapping = new Map<ClickIdentifier, ResolvedKeyword>();
    for (const result of results) {
      for (const [identifier, keyword] of result.resolved) {
        mapping.set(identifier, keyword);
      }
    }
    let resolvedCount = 0;
    for (const identifier of unique) {
      if (mapping.has(identifier)) {
        resolvedCount++;
      } else {
        mapping.set(identifier, unmappedLabel(identifier));
      }
    }

    const outcomes = results.map((result) => result.outcome);
    const failedBatchCount = outcomes.filter((outcome) => outcome.status === "FAILED").length;

    this.log.info("Click identifier resolution completed", {
      campaignId,
      requestedCount: unique.length,
      resolvedCount,
      unmappedCount: unique.length - resolvedCount,
      failedBatchCount,
    });

    return {
      mapping,
      batches: outcomes,
      requestedCount: unique.length,
      resolvedCount,
      unmappedCount: unique.length - resolvedCount,
      failedBatchCount,
    };
  }

  /**
   * 1バッチを解決（例外は投げず、失敗はアウトカムに記録）
   */
  private async resolveBatch(campaignId: string, batch: ResolutionBatch): Promise<BatchResult> {
    const { index, clickDate, identifiers } = batch;
    try {
      const resolved =
        this.strategy === "DIRECT"
          ? await this.resolveDirect(campaignId, identifiers, clickDate)
          : await this.resolveTwoHop(campaignId, identifiers, clickDate);

      return {
        outcome: {
          index,
          clickDate,
          size: identifiers.length,
          status: "OK",
          resolvedCount: resolved.size,
        },
        resolved,
      };
    } catch (error) {
      this.log.warn("Identifier batch resolution failed, degrading to unmapped", {
        campaignId,
        batchIndex: index,
        clickDate,
        batchSize: identifiers.length,
        error: errorMessage(error),
      });
      return {
        outcome: {
          index,
          clickDate,
          size: identifiers.length,
          status: "FAILED",
          resolvedCount: 0,
          error: errorMessage(error),
        },
        resolved: new Map(),
      };
    }
  }

  private async resolveDirect(
    campaignId: string,
    batch: ClickIdentifier[],
    clickDate: string | null
  ): Promise<Map<ClickIdentifier, ResolvedKeyword>> {
    const response = await this.directory.resolveIdentifiers(campaignId, batch, clickDate);
    const resolved = new Map<ClickIdentifier, ResolvedKeyword>();
    // バッチ外のキーが返ってきても採用しない
    for (const identifier of batch) {
      const keyword = response.get(identifier);
      if (keyword !== undefined && keyword.length > 0) {
        resolved.set(identifier, keyword);
      }
    }
    return resolved;
  }

  /**
   * two-hop 解決
   *
   * 広告グループに紐づく最初のキーワードを採用する。
   * キーワードがない・リソース名が読めない識別子は結果に含めず、
   * 呼び出し側で Unmapped に落とす
   */
  private async resolveTwoHop(
    campaignId: string,
    batch: ClickIdentifier[],
    clickDate: string | null
  ): Promise<Map<ClickIdentifier, ResolvedKeyword>> {
    const adGroupAds = await this.directory.resolveAdGroupAds(campaignId, batch, clickDate);

    const adGroupByIdentifier = new Map<ClickIdentifier, string>();
    for (const identifier of batch) {
      const resourceName = adGroupAds.get(identifier);
      if (resourceName === undefined) {
        continue;
      }
      const parsed = parseAdGroupAdResourceName(resourceName);
      if (!parsed.ok) {
        this.log.debug("Unparseable adGroupAd resource name", {
          identifier,
          reason: parsed.error.reason,
          input: parsed.error.input,
        });
        continue;
      }
      adGroupByIdentifier.set(identifier, parsed.value.adGroupId);
    }

    const resolved = new Map<ClickIdentifier, ResolvedKeyword>();
    if (adGroupByIdentifier.size === 0) {
      return resolved;
    }

    const adGroupIds = dedupeIdentifiers(adGroupByIdentifier.values());
    const keywordsByAdGroup = await this.directory.listAdGroupKeywords(campaignId, adGroupIds);

    for (const [identifier, adGroupId] of adGroupByIdentifier) {
      const keyword = keywordsByAdGroup.get(adGroupId)?.find((text) => text.length > 0);
      if (keyword !== undefined) {
        resolved.set(identifier, keyword);
      }
    }
    return resolved;
  }
}
