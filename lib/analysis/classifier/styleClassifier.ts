import type { AxisScores, ClassificationResult } from "../types";

/**
 * Pluggable label strategy.
 * Implementations must be pure: identical axes give identical results.
 */
export interface StyleClassifier {
  readonly kind: string;
  classify(axes: AxisScores): ClassificationResult;
}
