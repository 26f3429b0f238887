/**
 * 入札変更の適用モジュール
 *
 * 主要エクスポート:
 * - executeBidChanges: 安全フィルター → モード別適用
 * - loadApplySafetyConfig: 環境変数から安全制限設定を読み込む
 */

// =============================================================================
// 型定義
// =============================================================================

export {
  BidChange,
  ChangeApplier,
  ApplyStatus,
  ApplySkipReason,
  BidChangeResult,
  ApplySafetyConfig,
  DEFAULT_APPLY_SAFETY_CONFIG,
  ApplyExecutionStats,
  createEmptyApplyExecutionStats,
} from "./types";

// =============================================================================
// 設定ローダー
// =============================================================================

export { loadApplySafetyConfig, logApplySafetyConfigOnStartup } from "./apply-config";

// =============================================================================
// フィルター・実行
// =============================================================================

export {
  checkApplyCandidate,
  filterApplyCandidates,
  isSignificantChange,
  ApplyCandidateCheck,
  ApplyFilterItem,
  ApplyFilterResult,
} from "./apply-filter";

export {
  executeBidChanges,
  summarizeBidChangeResults,
  BidChangeExecution,
} from "./bid-applier";
