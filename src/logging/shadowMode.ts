/**
 * シャドーモード
 *
 * 環境変数によって実行モードを決める。
 * 判定ロジックはモードを参照せず、モードは実行設定として明示的に渡す。
 * SHADOWモードでは入札変更を計算・記録するが、APIは呼び出さない
 */

import { logger } from "../logger";
import { ExecutionMode } from "./types";

// =============================================================================
// 環境変数
// =============================================================================

/**
 * 実行モードを決定する環境変数名
 */
export const EXECUTION_MODE_ENV_VAR = "BID_OPTIMIZER_EXECUTION_MODE";

/**
 * デフォルトの実行モード（安全のためSHADOW）
 */
export const DEFAULT_EXECUTION_MODE: ExecutionMode = "SHADOW";

// =============================================================================
// 実行モード判定
// =============================================================================

/**
 * 文字列から実行モードを解釈
 *
 * - "APPLY": 実際に Google Ads API を呼び出して入札を適用
 * - "SHADOW" / 未設定 / 不明な値: 適用しない
 */
export function parseExecutionMode(value: string | undefined): ExecutionMode {
  if (!value) {
    return DEFAULT_EXECUTION_MODE;
  }

  const normalizedValue = value.toUpperCase().trim();

  if (normalizedValue === "APPLY") {
    return "APPLY";
  }

  if (normalizedValue === "SHADOW") {
    return "SHADOW";
  }

  // 不明な値の場合は安全のためSHADOWにフォールバック
  logger.warn("Unknown execution mode, falling back to SHADOW", {
    value,
    envVar: EXECUTION_MODE_ENV_VAR,
  });
  return DEFAULT_EXECUTION_MODE;
}

/**
 * 環境変数から実行モードを取得
 */
export function getExecutionMode(): ExecutionMode {
  return parseExecutionMode(process.env[EXECUTION_MODE_ENV_VAR]);
}

// =============================================================================
// モード別実行ヘルパー
// =============================================================================

/**
 * 入札適用をモードに応じて実行
 *
 * SHADOWモードでは applyBidFn を呼ばない。
 * APPLYモードで失敗した場合も例外は投げず、error に入れて返す
 */
export async function applyBidWithMode(
  mode: ExecutionMode,
  applyBidFn: () => Promise<void>,
  keywordInfo: {
    criterionId: string;
    adGroupId: string;
    keywordText: string;
    oldBid: number;
    newBid: number;
  }
): Promise<{ wasApplied: boolean; error?: Error }> {
  if (mode === "SHADOW") {
    logger.debug("Shadow mode: skipping bid apply", {
      ...keywordInfo,
      mode,
    });
    return { wasApplied: false };
  }

  try {
    await applyBidFn();
    logger.debug("Bid applied successfully", {
      ...keywordInfo,
      mode,
    });
    return { wasApplied: true };
  } catch (error) {
    logger.error("Failed to apply bid", {
      ...keywordInfo,
      mode,
      error: error instanceof Error ? error.message : String(error),
    });
    return {
      wasApplied: false,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

// =============================================================================
// モード情報ロギング
// =============================================================================

/**
 * 起動時に実行モードをログ出力
 */
export function logExecutionModeOnStartup(mode: ExecutionMode): void {
  if (mode === "SHADOW") {
    logger.info("Bid optimizer starting in SHADOW mode", {
      mode,
      description: "Decisions will be calculated and logged but NOT applied to Google Ads",
      envVar: EXECUTION_MODE_ENV_VAR,
      tip: `Set ${EXECUTION_MODE_ENV_VAR}=APPLY to enable actual bid changes`,
    });
  } else {
    logger.info("Bid optimizer starting in APPLY mode", {
      mode,
      description: "Bid changes WILL be applied to Google Ads API",
      warning: "This will modify actual bid amounts",
    });
  }
}
