/**
 * Analysis Orchestrator
 *
 * Drives one submission end to end:
 *   validate -> create analysis -> per image (store, infer, persist result)
 *   -> recompute summary -> recommend -> compose result
 *
 * Per-image inference failures are recorded as error rows and never abort the
 * batch. Persistence failures are fatal: the analysis is marked failed on a
 * best-effort basis and the error propagates.
 */

import type { Analysis, ImageResult, Recommendation } from "../../shared/schema";
import type { PipelineConfig } from "../config/pipelineConfig";
import type { IStorage } from "../storage";
import { safeLogger } from "../safe_logger";
import { mapWithConcurrency } from "../utils/concurrency";
import { errorMessage, invalidState, notFound } from "../utils/pipelineErrors";
import { aggregate, allFailed, deriveSeverity, dominantCrop, dominantDisease } from "./aggregationEngine";
import {
  composeAnalysisResult,
  toHistoryItem,
  type AnalysisHistoryPage,
  type AnalysisResult,
} from "./analysisResult";
import type { ImageIntakeValidator, AcceptedImage, IncomingImage } from "./imageIntakeValidator";
import type { ImageStore } from "./imageStore";
import type { InferenceAdapter } from "./inferenceAdapter";
import type { RecommendationAdapter } from "./recommendationAdapter";

export const HISTORY_PAGE_SIZE = 20;
export const UNKNOWN_CROP = "Unknown";

const ALL_IMAGES_FAILED = "Inference failed for every image";

export interface AnalysisOwner {
  id: string;
}

export interface HistoryFilters {
  cropType?: string;
  from?: Date;
  to?: Date;
  search?: string;
  page?: number;
}

export interface SubmitOptions {
  signal?: AbortSignal;
}

export interface AnalysisOrchestratorDeps {
  storage: IStorage;
  imageStore: ImageStore;
  validator: ImageIntakeValidator;
  inference: InferenceAdapter;
  recommendations: RecommendationAdapter;
  config: Pick<PipelineConfig, "severityThresholds" | "inferenceConcurrency">;
}

export class AnalysisOrchestrator {
  constructor(private readonly deps: AnalysisOrchestratorDeps) {}

  async submit(
    user: AnalysisOwner,
    images: readonly IncomingImage[],
    cropType?: string,
    options: SubmitOptions = {},
  ): Promise<AnalysisResult> {
    const { storage } = this.deps;
    const intake = await this.deps.validator.validateBatch(images);
    const requestedCrop = cropType?.trim();

    const analysis = await storage.createAnalysis({
      userId: user.id,
      cropType: requestedCrop || UNKNOWN_CROP,
      status: "processing",
    });

    safeLogger.info("[Analysis] Submission accepted", {
      analysisId: analysis.id,
      accepted: intake.accepted.length,
      rejected: intake.rejected.length,
    });

    try {
      await mapWithConcurrency(intake.accepted, this.deps.config.inferenceConcurrency, image =>
        this.processImage(analysis.id, user.id, image),
      );

      const { analysis: summarized, results } = await this.summarize(analysis.id);
      const recommendations: Recommendation[] = [];

      if (summarized.status === "completed") {
        const recommendation = await this.recommendFor(summarized, results, options.signal);
        if (recommendation) recommendations.push(recommendation);
      }

      return composeAnalysisResult(summarized, results, recommendations, intake.rejected);
    } catch (error) {
      await this.markFailed(analysis.id, error);
      throw error;
    }
  }

  async getHistory(user: AnalysisOwner, filters: HistoryFilters = {}): Promise<AnalysisHistoryPage> {
    const page = Math.max(1, filters.page ?? 1);

    // One extra row tells us whether another page exists
    const rows = await this.deps.storage.listAnalyses(user.id, {
      cropType: filters.cropType,
      from: filters.from,
      to: filters.to,
      search: filters.search,
      limit: HISTORY_PAGE_SIZE + 1,
      offset: (page - 1) * HISTORY_PAGE_SIZE,
    });

    const pageRows = rows.slice(0, HISTORY_PAGE_SIZE);
    const results = await Promise.all(
      pageRows.map(async analysis => toHistoryItem(analysis, await this.deps.storage.getImageResults(analysis.id))),
    );

    return {
      page,
      pageSize: HISTORY_PAGE_SIZE,
      hasMore: rows.length > HISTORY_PAGE_SIZE,
      results,
    };
  }

  async getDetail(user: AnalysisOwner, analysisId: string): Promise<AnalysisResult> {
    const analysis = await this.getOwnedAnalysis(user, analysisId);
    const [results, recommendations] = await Promise.all([
      this.deps.storage.getImageResults(analysis.id),
      this.deps.storage.getRecommendationsForAnalysis(analysis.id),
    ]);
    return composeAnalysisResult(analysis, results, recommendations);
  }

  /**
   * Re-derives the summary from stored image results. Running it again with
   * the same results writes the same values.
   */
  async recomputeSummary(analysisId: string): Promise<Analysis> {
    const { analysis } = await this.summarize(analysisId);
    return analysis;
  }

  /**
   * Requests a fresh AI recommendation for a completed analysis owned by the user.
   */
  async regenerateRecommendation(
    user: AnalysisOwner,
    analysisId: string,
    options: SubmitOptions = {},
  ): Promise<AnalysisResult> {
    const analysis = await this.getOwnedAnalysis(user, analysisId);
    if (analysis.status !== "completed") {
      throw invalidState("Recommendations can only be requested for completed analyses", {
        analysisId,
        currentStatus: analysis.status,
      });
    }

    const results = await this.deps.storage.getImageResults(analysis.id);
    await this.recommendFor(analysis, results, options.signal);

    const recommendations = await this.deps.storage.getRecommendationsForAnalysis(analysis.id);
    return composeAnalysisResult(analysis, results, recommendations);
  }

  private async getOwnedAnalysis(user: AnalysisOwner, analysisId: string): Promise<Analysis> {
    const analysis = await this.deps.storage.getAnalysis(analysisId);
    // Someone else's analysis is indistinguishable from a missing one
    if (!analysis || analysis.userId !== user.id) {
      throw notFound("Analysis not found", { analysisId });
    }
    return analysis;
  }

  private async processImage(analysisId: string, ownerId: string, image: AcceptedImage): Promise<ImageResult> {
    const { storage, imageStore, inference, config } = this.deps;

    const imageLocator = await imageStore.save(ownerId, image);
    const outcome = await inference.infer(image.data);

    return storage.createImageResult({
      analysisId,
      imageName: image.name,
      imageLocator,
      diseaseDetected: outcome.label,
      cropDetected: outcome.crop,
      confidenceScore: outcome.confidence,
      severity: deriveSeverity(outcome.label, outcome.confidence, config.severityThresholds),
      errorMessage: outcome.kind === "error" ? outcome.error : null,
    });
  }

  private async summarize(analysisId: string): Promise<{ analysis: Analysis; results: ImageResult[] }> {
    const { storage } = this.deps;

    const analysis = await storage.getAnalysis(analysisId);
    if (!analysis) {
      throw notFound("Analysis not found", { analysisId });
    }

    const results = await storage.getImageResults(analysisId);
    if (results.length === 0) {
      return { analysis, results };
    }

    const summary = aggregate(results);
    const failed = allFailed(results);
    const detectedCrop = analysis.cropType === UNKNOWN_CROP ? dominantCrop(results) : undefined;

    const updated = await storage.updateAnalysis(analysisId, {
      averageConfidence: summary.averageConfidence,
      averageSeverity: summary.averageSeverity,
      status: failed ? "failed" : "completed",
      errorMessage: failed ? ALL_IMAGES_FAILED : null,
      ...(detectedCrop ? { cropType: detectedCrop } : {}),
    });
    if (!updated) {
      throw notFound("Analysis not found", { analysisId });
    }

    return { analysis: updated, results };
  }

  private async recommendFor(
    analysis: Analysis,
    results: readonly ImageResult[],
    signal?: AbortSignal,
  ): Promise<Recommendation | null> {
    if (signal?.aborted) {
      safeLogger.info("[Analysis] Caller went away before recommendation", { analysisId: analysis.id });
      return null;
    }

    const outcome = await this.deps.recommendations.recommend(
      {
        cropType: analysis.cropType,
        disease: dominantDisease(results),
        severity: analysis.averageSeverity ?? "low",
        averageConfidence: analysis.averageConfidence ?? 0,
      },
      signal,
    );

    if (outcome.kind === "cancelled") {
      return null;
    }

    return this.deps.storage.createRecommendation({
      analysisId: analysis.id,
      generatedBy: "ai",
      content: outcome.content,
      source: outcome.source,
    });
  }

  private async markFailed(analysisId: string, cause: unknown): Promise<void> {
    safeLogger.error("[Analysis] Submission failed", { analysisId, error: errorMessage(cause) });
    const { storage } = this.deps;
    try {
      // Summary still reflects whatever rows made it to storage
      const summary = aggregate(await storage.getImageResults(analysisId));
      await storage.updateAnalysis(analysisId, {
        status: "failed",
        errorMessage: "Analysis could not be completed",
        averageConfidence: summary.averageConfidence,
        averageSeverity: summary.averageSeverity,
      });
    } catch (error) {
      safeLogger.error("[Analysis] Could not mark analysis as failed", { analysisId, error: errorMessage(error) });
    }
  }
}
