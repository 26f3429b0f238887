/**
 * 入札変更の適用 - 型定義
 *
 * Google Ads への入札変更の適用と、その安全制御に関する型定義
 */

// =============================================================================
// 入札変更
// =============================================================================

/**
 * Google Ads へ送る入札変更（newBid はクランプ済み）
 */
export interface BidChange {
  criterionId: string;
  adGroupId: string;
  keywordText: string;
  oldBid: number;
  newBid: number;
  /** 判定理由 */
  reason: string;
}

/**
 * 入札変更を適用する外部コラボレーター
 *
 * APPLYモードのときだけ呼び出される。失敗時は reject する
 */
export interface ChangeApplier {
  apply(change: BidChange): Promise<void>;
}

// =============================================================================
// 適用ステータス
// =============================================================================

/**
 * 入札変更ごとの適用結果
 * - APPLIED: Google Ads に適用した
 * - SHADOW:  SHADOWモードのため送らなかった（APPLYモードなら送っていた）
 * - SKIPPED: 安全制限によりスキップ
 * - FAILED:  API呼び出しが失敗した
 */
export type ApplyStatus = "APPLIED" | "SHADOW" | "SKIPPED" | "FAILED";

/**
 * APPLY をスキップした理由
 */
export type ApplySkipReason =
  | "APPLY_LIMIT_REACHED" // maxApplyChangesPerRun の上限に達した
  | "NO_SIGNIFICANT_CHANGE"; // 変更幅が閾値未満

export interface BidChangeResult extends BidChange {
  status: ApplyStatus;
  skipReason?: ApplySkipReason;
  error?: string;
}

// =============================================================================
// APPLY 設定
// =============================================================================

/**
 * APPLY の安全制限設定
 */
export interface ApplySafetyConfig {
  /**
   * 1回の実行でAPIへ送ってよい入札変更件数の上限
   *
   * 環境変数: MAX_APPLY_CHANGES_PER_RUN
   * デフォルト: 100件
   */
  maxApplyChangesPerRun: number;

  /**
   * APPLYに必要な最小変更幅（通貨単位）
   *
   * 環境変数: MIN_APPLY_CHANGE_AMOUNT
   * デフォルト: 0.01
   */
  minApplyChangeAmount: number;

  /**
   * APPLYに必要な最小変更率（0.01 = 1%）
   *
   * 環境変数: MIN_APPLY_CHANGE_RATIO
   * デフォルト: 0.01
   */
  minApplyChangeRatio: number;
}

export const DEFAULT_APPLY_SAFETY_CONFIG: ApplySafetyConfig = {
  maxApplyChangesPerRun: 100,
  minApplyChangeAmount: 0.01,
  minApplyChangeRatio: 0.01,
};

// =============================================================================
// APPLY 実行統計
// =============================================================================

export interface ApplyExecutionStats {
  totalChanges: number;
  totalApplied: number;
  totalShadow: number;
  totalSkipped: number;
  totalFailed: number;
  skipReasonCounts: Record<ApplySkipReason, number>;
}

export function createEmptyApplyExecutionStats(): ApplyExecutionStats {
  return {
    totalChanges: 0,
    totalApplied: 0,
    totalShadow: 0,
    totalSkipped: 0,
    totalFailed: 0,
    skipReasonCounts: {
      APPLY_LIMIT_REACHED: 0,
      NO_SIGNIFICANT_CHANGE: 0,
    },
  };
}
