/**
 * Recommendation Adapter
 *
 * Wraps the external recommendation generator. Generator failures, empty
 * output and timeouts never reach the caller: they produce a deterministic
 * template for the analysis severity instead, tagged as a fallback. A caller
 * abort cancels the step and nothing is returned for persistence.
 */

import type { RecommendationSource, Severity } from "../../shared/schema";
import { safeLogger } from "../safe_logger";
import { dependencyUnavailable, errorMessage } from "../utils/pipelineErrors";
import { isDiseaseLabel, isHealthyLabel } from "./aggregationEngine";

export interface RecommendationContext {
  cropType: string;
  disease: string;
  severity: Severity;
  averageConfidence: number;
}

export interface RecommendationGenerator {
  generate(context: RecommendationContext, signal: AbortSignal): Promise<string>;
}

export type RecommendationOutcome =
  | { kind: "generated"; content: string; source: Extract<RecommendationSource, "model" | "fallback"> }
  | { kind: "cancelled" };

export interface RecommendationAdapterOptions {
  timeoutMs: number;
}

export class RecommendationTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Recommendation generator did not answer within ${timeoutMs}ms`);
    this.name = "RecommendationTimeoutError";
  }
}

const REVIEW_NOTE = "This is general guidance prepared without AI assistance and is awaiting expert review.";

const DISEASE_GUIDANCE: Record<Severity, string> = {
  high: "Isolate affected plants immediately and remove infected leaves and plant debris. Consult your local agricultural extension service before applying any treatment, and inspect neighbouring plants daily.",
  medium: "Isolate affected plants, remove visibly infected leaves and improve air circulation around the crop. Consult your local agricultural extension service about a suitable treatment.",
  low: "Monitor affected plants every 2-3 days, remove infected leaves and avoid overhead watering. Consult your local agricultural extension service if symptoms spread.",
};

/**
 * Deterministic advice used whenever the generator cannot answer.
 */
export function fallbackRecommendation(context: RecommendationContext): string {
  const crop = context.cropType.trim() || "crop";

  if (isHealthyLabel(context.disease)) {
    return `Your ${crop} appears healthy. Continue regular monitoring: inspect leaves weekly, keep a consistent watering schedule without waterlogging, and keep enough spacing between plants for air circulation. ${REVIEW_NOTE}`;
  }

  if (!isDiseaseLabel(context.disease)) {
    return `The ${crop} images could not be classified with confidence. Retake clear photos of affected leaves in natural light. If symptoms are visible, isolate affected plants and consult your local agricultural extension service. ${REVIEW_NOTE}`;
  }

  return `${context.disease} detected in ${crop} with ${context.severity} severity. ${DISEASE_GUIDANCE[context.severity]} ${REVIEW_NOTE}`;
}

export class RecommendationAdapter {
  constructor(
    private readonly generator: RecommendationGenerator | null,
    private readonly options: RecommendationAdapterOptions,
  ) {}

  async recommend(context: RecommendationContext, signal?: AbortSignal): Promise<RecommendationOutcome> {
    if (signal?.aborted) {
      return { kind: "cancelled" };
    }

    if (!this.generator) {
      safeLogger.debug("[Recommendation] No generator configured, using template");
      return this.fallback(context);
    }

    const controller = new AbortController();
    const abortFromCaller = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", abortFromCaller, { once: true });

    // Settles only on abort, so a generator that ignores its signal cannot
    // hold the request past the budget
    const stopped = new Promise<never>((_, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    const timer = setTimeout(
      () => controller.abort(new RecommendationTimeoutError(this.options.timeoutMs)),
      this.options.timeoutMs,
    );

    try {
      const content = (await Promise.race([this.generator.generate(context, controller.signal), stopped])).trim();
      if (!content) {
        throw new Error("Generator returned empty content");
      }
      return { kind: "generated", content, source: "model" };
    } catch (error) {
      if (signal?.aborted) {
        safeLogger.info("[Recommendation] Cancelled by caller");
        return { kind: "cancelled" };
      }

      const failure = dependencyUnavailable("Recommendation generator unavailable", {
        reason: errorMessage(error),
        timedOut: error instanceof RecommendationTimeoutError,
      });
      safeLogger.warn(`[Recommendation] ${failure.message}, using template`, failure.details);
      return this.fallback(context);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", abortFromCaller);
    }
  }

  private fallback(context: RecommendationContext): RecommendationOutcome {
    return { kind: "generated", content: fallbackRecommendation(context), source: "fallback" };
  }
}
