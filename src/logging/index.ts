/**
 * 実行モードモジュール
 */

export { ExecutionMode, TriggerSource } from "./types";

export {
  EXECUTION_MODE_ENV_VAR,
  DEFAULT_EXECUTION_MODE,
  parseExecutionMode,
  getExecutionMode,
  applyBidWithMode,
  logExecutionModeOnStartup,
} from "./shadowMode";
