/**
 * 実行モードの型定義
 */

/**
 * 実行モード
 * - SHADOW: 判定と入札変更を計算・記録するが、Google Ads には送らない
 * - APPLY:  入札変更を Google Ads に適用する
 */
export type ExecutionMode = "APPLY" | "SHADOW";

/**
 * 実行のトリガー元
 */
export type TriggerSource = "CRON" | "API" | "MANUAL";
