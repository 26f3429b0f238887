/**
 * ルートインデックス
 */

export { default as healthRoutes } from "./health";
export {
  createOptimizeRoutes,
  handleOptimizationRequest,
  OptimizationRunner,
  OptimizationResponseBody,
} from "./optimize";
