/**
 * 最適化実行モジュール
 */

export {
  OptimizationRequest,
  OptimizationSettings,
  OptimizationDependencies,
  OptimizationRun,
  OptimizationOutcome,
} from "./types";

export { runOptimization, planBidChanges } from "./optimization-engine";
