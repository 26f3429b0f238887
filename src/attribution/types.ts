/**
 * アトリビューション（識別子抽出・解決・キーワード集計）の型定義
 */

import { ATTRIBUTION_LABELS } from "../constants";

// =============================================================================
// トラフィック
// =============================================================================

/**
 * 1件のクリック（ランディング）記録
 */
export interface TrafficRecord {
  /** クリックログ上のID */
  recordId?: string;
  /** 遷移先URL（gclid / gbraid を含む） */
  destinationUrl: string;
  /** クリック単価（欠損時は 0 として扱う） */
  cost: number | null;
  /** コンバージョン種別タグ */
  conversionKind: string | null;
  /** 分析対象の有料チャネル由来かどうか */
  sourceFlag: boolean;
  /** クリック日時 */
  timestamp: Date | null;
}

/**
 * クリックログの取得元
 */
export interface TrafficSource {
  /**
   * アトリビューション期間内の有料チャネルのレコードを取得
   * @throws {DataUnavailableError} データを取得できない場合
   */
  fetch(windowDays: number): Promise<TrafficRecord[]>;
}

// =============================================================================
// 識別子
// =============================================================================

export type ClickIdentifierKind = "gclid" | "gbraid";

/** 不透明なクリック識別子（完全一致で比較） */
export type ClickIdentifier = string;

/** 識別子から解決されたキーワード（または Unmapped ラベル） */
export type ResolvedKeyword = string;

export type IdentityMapping = ReadonlyMap<ClickIdentifier, ResolvedKeyword>;

/**
 * 解決対象のクリック
 */
export interface ClickOccurrence {
  identifier: ClickIdentifier;
  /** アカウントのタイムゾーンでのクリック日（YYYY-MM-DD）。日時が不明なら null */
  clickDate: string | null;
}

/**
 * 解決できなかった識別子のラベル
 */
export function unmappedLabel(identifier: ClickIdentifier): ResolvedKeyword {
  return `${ATTRIBUTION_LABELS.UNMAPPED_PREFIX}(${identifier})`;
}

// =============================================================================
// キャンペーン情報（外部ディレクトリ）
// =============================================================================

/**
 * キャンペーンで有効なキーワード
 */
export interface EnabledKeyword {
  criterionId: string;
  adGroupId: string;
  text: string;
  /** 現在の入札額（通貨単位）。未設定の場合は 0 */
  currentBid: number;
}

/**
 * 識別子→キーワード解決とキーワード一覧を提供する外部ディレクトリ
 *
 * 各メソッドは部分的な結果を返してよい（解決できないキーは省略される）
 * 識別子の解決は1回の呼び出しにつき1日分のクリックだけを渡す
 */
export interface CampaignDirectory {
  /** direct: 識別子 → キーワードテキスト */
  resolveIdentifiers(
    campaignId: string,
    batch: readonly ClickIdentifier[],
    clickDate: string | null
  ): Promise<Map<ClickIdentifier, string>>;

  /** two-hop 1段目: 識別子 → adGroupAd リソース名 */
  resolveAdGroupAds(
    campaignId: string,
    batch: readonly ClickIdentifier[],
    clickDate: string | null
  ): Promise<Map<ClickIdentifier, string>>;

  /** two-hop 2段目: 広告グループID → キーワードテキスト一覧 */
  listAdGroupKeywords(
    campaignId: string,
    adGroupIds: readonly string[]
  ): Promise<Map<string, string[]>>;

  /** キャンペーンの有効キーワード一覧 */
  listEnabledKeywords(campaignId: string): Promise<EnabledKeyword[]>;
}

// =============================================================================
// 識別子解決
// =============================================================================

export type ResolutionStrategy = "DIRECT" | "TWO_HOP";

export const VALID_RESOLUTION_STRATEGIES: readonly ResolutionStrategy[] = [
  "DIRECT",
  "TWO_HOP",
];

export function isValidResolutionStrategy(value: string): value is ResolutionStrategy {
  return VALID_RESOLUTION_STRATEGIES.some((strategy) => strategy === value);
}

export interface IdentityResolverOptions {
  strategy: ResolutionStrategy;
  /** 1バッチの識別子数（上限 50） */
  batchSize?: number;
  /** 同時に発行するバッチ数 */
  concurrency?: number;
}

/**
 * バッチごとの解決結果
 */
export interface ResolutionBatchOutcome {
  index: number;
  /** バッチ内のクリック日 */
  clickDate: string | null;
  size: number;
  status: "OK" | "FAILED";
  resolvedCount: number;
  error?: string;
}

export interface IdentityResolutionResult {
  mapping: IdentityMapping;
  batches: ResolutionBatchOutcome[];
  requestedCount: number;
  resolvedCount: number;
  unmappedCount: number;
  failedBatchCount: number;
}

// =============================================================================
// キーワード集計
// =============================================================================

/**
 * キーワード単位の統計
 *
 * 不変条件: conversionCount <= clicks, conversionValue <= cost
 */
export interface KeywordStats {
  clicks: number;
  cost: number;
  conversionCount: number;
  /** コンバージョンが発生したクリックのコスト合計 */
  conversionValue: number;
  /** cost / clicks（clicks = 0 の場合は 0） */
  averageCostPerClick: number;
}

export type KeywordStatsMap = Map<ResolvedKeyword, KeywordStats>;

export interface AggregationOptions {
  /** コンバージョンとして数える conversion_kind */
  conversionKinds: Iterable<string>;
  /** トラフィックがなくても統計に含めるキーワード */
  enabledKeywords?: Iterable<string>;
}

export interface KeywordAggregationResult {
  stats: KeywordStatsMap;
  /** 集計したレコード数 */
  processedRecordCount: number;
  /** 有料チャネル以外で除外したレコード数 */
  skippedRecordCount: number;
  /** 識別子を取り出せなかったレコード数 */
  unidentifiedRecordCount: number;
}
