/**
 * APPLY フィルター
 *
 * 入札変更を Google Ads API に送る前のフィルタリングロジック。
 * どの変更を実際にAPIへ送るかを判定する（SHADOWモードでも同じ判定を行う）
 */

import { logger } from "../logger";
import {
  ApplySafetyConfig,
  ApplySkipReason,
  DEFAULT_APPLY_SAFETY_CONFIG,
} from "./types";

// =============================================================================
// APPLY 候補判定
// =============================================================================

/**
 * 変更が有意かどうかをチェック
 */
export function isSignificantChange(
  oldBid: number,
  newBid: number,
  minChangeAmount: number,
  minChangeRatio: number
): boolean {
  const changeAmount = Math.abs(newBid - oldBid);
  if (changeAmount < minChangeAmount) {
    return false;
  }

  if (oldBid > 0) {
    const changeRatio = Math.abs((newBid - oldBid) / oldBid);
    if (changeRatio < minChangeRatio) {
      return false;
    }
  }

  return true;
}

export type ApplyCandidateCheck =
  | { isCandidate: true }
  | { isCandidate: false; skipReason: ApplySkipReason };

/**
 * 単一の入札変更がAPPLY候補かどうかを判定
 *
 * 変更幅が minApplyChangeAmount 以上、かつ変更率が minApplyChangeRatio 以上のとき候補となる
 */
export function checkApplyCandidate(
  oldBid: number,
  newBid: number,
  config: ApplySafetyConfig = DEFAULT_APPLY_SAFETY_CONFIG
): ApplyCandidateCheck {
  if (
    !isSignificantChange(
      oldBid,
      newBid,
      config.minApplyChangeAmount,
      config.minApplyChangeRatio
    )
  ) {
    return { isCandidate: false, skipReason: "NO_SIGNIFICANT_CHANGE" };
  }
  return { isCandidate: true };
}

// =============================================================================
// バッチフィルタリング
// =============================================================================

/**
 * フィルタリング対象のアイテム
 */
export interface ApplyFilterItem {
  oldBid: number;
  newBid: number;
}

export interface ApplyFilterResult<T extends ApplyFilterItem> {
  /** APPLY対象（maxApplyChangesPerRun 以内） */
  toApply: T[];
  skipped: Array<T & { skipReason: ApplySkipReason }>;
}

/**
 * 入札変更リストをフィルタリングしてAPPLY対象を決定
 *
 * 1. 各変更について checkApplyCandidate で候補かを判定
 * 2. 候補を maxApplyChangesPerRun までに制限（入力順で先着）
 * 3. 超えた分は APPLY_LIMIT_REACHED でスキップ
 */
export function filterApplyCandidates<T extends ApplyFilterItem>(
  items: readonly T[],
  config: ApplySafetyConfig = DEFAULT_APPLY_SAFETY_CONFIG
): ApplyFilterResult<T> {
  const toApply: T[] = [];
  const skipped: Array<T & { skipReason: ApplySkipReason }> = [];

  for (const item of items) {
    const check = checkApplyCandidate(item.oldBid, item.newBid, config);

    if (!check.isCandidate) {
      skipped.push({ ...item, skipReason: check.skipReason });
      continue;
    }

    if (toApply.length >= config.maxApplyChangesPerRun) {
      skipped.push({ ...item, skipReason: "APPLY_LIMIT_REACHED" });
      continue;
    }

    toApply.push(item);
  }

  logger.debug("Apply filter completed", {
    totalItems: items.length,
    toApplyCount: toApply.length,
    skippedCount: skipped.length,
    maxApplyChangesPerRun: config.maxApplyChangesPerRun,
  });

  return { toApply, skipped };
}
