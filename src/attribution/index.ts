/**
 * アトリビューションモジュール
 *
 * クリックログをキーワードに帰属させる
 *
 * 主要エクスポート:
 * - extractClickIdentifier: URLから gclid / gbraid を取り出す
 * - IdentityResolver: 識別子をバッチでキーワードに解決
 * - aggregateKeywordStats: キーワード単位の統計集計（純粋関数）
 */

// =============================================================================
// 型定義
// =============================================================================

export {
  TrafficRecord,
  TrafficSource,
  ClickIdentifier,
  ClickIdentifierKind,
  ResolvedKeyword,
  IdentityMapping,
  ClickOccurrence,
  EnabledKeyword,
  CampaignDirectory,
  ResolutionStrategy,
  VALID_RESOLUTION_STRATEGIES,
  isValidResolutionStrategy,
  IdentityResolverOptions,
  ResolutionBatchOutcome,
  IdentityResolutionResult,
  KeywordStats,
  KeywordStatsMap,
  AggregationOptions,
  KeywordAggregationResult,
  unmappedLabel,
} from "./types";

// =============================================================================
// 識別子抽出・リソース名パース
// =============================================================================

export {
  extractClickIdentifier,
  detectClickIdentifier,
  formatClickDate,
  ExtractedClickIdentifier,
} from "./click-identifier";

export {
  parseAdGroupAdResourceName,
  AdGroupAdRef,
  ResourceNameParseResult,
  ResourceNameParseFailureReason,
} from "./resource-name";

// =============================================================================
// 識別子解決
// =============================================================================

export {
  IdentityResolver,
  dedupeIdentifiers,
  chunkIdentifiers,
  planResolutionBatches,
  ResolutionBatch,
} from "./identity-resolver";

// =============================================================================
// 集計
// =============================================================================

export {
  aggregateKeywordStats,
  collectClickIdentifiers,
  resolveRecordKeyword,
  createEmptyStats,
  getOrCreateStats,
  normalizeCost,
  computeAverageCostPerClick,
} from "./keyword-aggregator";
