/**
 * APPLY 安全制限設定ローダー
 *
 * 環境変数からAPPLY安全制限設定を読み込む
 */

import { logger } from "../logger";
import {
  ApplySafetyConfig,
  DEFAULT_APPLY_SAFETY_CONFIG,
} from "./types";

// =============================================================================
// 環境変数名
// =============================================================================

/**
 * 1回のジョブ実行で実際にAPIへ送ってよいbid更新件数の上限
 */
const MAX_APPLY_CHANGES_PER_RUN_ENV = "MAX_APPLY_CHANGES_PER_RUN";

/**
 * APPLYに必要な最小変更幅（通貨単位）
 */
const MIN_APPLY_CHANGE_AMOUNT_ENV = "MIN_APPLY_CHANGE_AMOUNT";

/**
 * APPLYに必要な最小変更率（比率、例: 0.01 = 1%）
 */
const MIN_APPLY_CHANGE_RATIO_ENV = "MIN_APPLY_CHANGE_RATIO";

// =============================================================================
// 設定ローダー
// =============================================================================

/**
 * 環境変数からAPPLY安全制限設定を読み込む
 *
 * 環境変数:
 * - MAX_APPLY_CHANGES_PER_RUN: 1回の実行で送ってよい件数（デフォルト: 100）
 * - MIN_APPLY_CHANGE_AMOUNT: 最小変更幅（デフォルト: 0.01）
 * - MIN_APPLY_CHANGE_RATIO: 最小変更率（デフォルト: 0.01 = 1%）
 */
export function loadApplySafetyConfig(
  env: NodeJS.ProcessEnv = process.env
): ApplySafetyConfig {
  const config: ApplySafetyConfig = { ...DEFAULT_APPLY_SAFETY_CONFIG };

  // MAX_APPLY_CHANGES_PER_RUN
  const maxApplyChangesEnv = env[MAX_APPLY_CHANGES_PER_RUN_ENV];
  if (maxApplyChangesEnv) {
    const parsed = parseInt(maxApplyChangesEnv, 10);
    if (!isNaN(parsed) && parsed > 0) {
      config.maxApplyChangesPerRun = parsed;
    } else {
      logger.warn(`Invalid ${MAX_APPLY_CHANGES_PER_RUN_ENV}, using default`, {
        envValue: maxApplyChangesEnv,
        default: DEFAULT_APPLY_SAFETY_CONFIG.maxApplyChangesPerRun,
      });
    }
  }

  // MIN_APPLY_CHANGE_AMOUNT
  const minAmountEnv = env[MIN_APPLY_CHANGE_AMOUNT_ENV];
  if (minAmountEnv) {
    const parsed = parseFloat(minAmountEnv);
    if (!isNaN(parsed) && parsed >= 0) {
      config.minApplyChangeAmount = parsed;
    } else {
      logger.warn(`Invalid ${MIN_APPLY_CHANGE_AMOUNT_ENV}, using default`, {
        envValue: minAmountEnv,
        default: DEFAULT_APPLY_SAFETY_CONFIG.minApplyChangeAmount,
      });
    }
  }

  // MIN_APPLY_CHANGE_RATIO
  const minRatioEnv = env[MIN_APPLY_CHANGE_RATIO_ENV];
  if (minRatioEnv) {
    const parsed = parseFloat(minRatioEnv);
    if (!isNaN(parsed) && parsed >= 0 && parsed <= 1) {
      config.minApplyChangeRatio = parsed;
    } else {
      logger.warn(`Invalid ${MIN_APPLY_CHANGE_RATIO_ENV}, using default`, {
        envValue: minRatioEnv,
        default: DEFAULT_APPLY_SAFETY_CONFIG.minApplyChangeRatio,
      });
    }
  }

  return config;
}

/**
 * APPLY設定を起動時にログ出力
 */
export function logApplySafetyConfigOnStartup(config: ApplySafetyConfig): void {
  logger.info("APPLY safety config loaded", {
    maxApplyChangesPerRun: config.maxApplyChangesPerRun,
    minApplyChangeAmount: config.minApplyChangeAmount,
    minApplyChangeRatio: config.minApplyChangeRatio,
  });
}
