/**
 * Response shapes for analyses. The internal recommendation `source` tag and
 * image locators stay server-side.
 */

import type {
  Analysis,
  AnalysisStatus,
  ImageResult,
  Recommendation,
  RecommendationAuthor,
  RecommendationStatus,
  Severity,
} from "../../shared/schema";
import { dominantDisease } from "./aggregationEngine";
import type { RejectedImage } from "./imageIntakeValidator";
import { selectAuthoritative } from "./reviewWorkflow";

export interface ImageResultView {
  imageName: string;
  disease: string;
  crop: string | null;
  severity: Severity;
  confidence: number;
  error?: string;
}

export interface RecommendationView {
  id: string;
  generatedBy: RecommendationAuthor;
  content: string;
  status: RecommendationStatus;
  adminFeedback: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface AnalysisResult {
  analysisId: string;
  cropType: string;
  disease: string;
  confidence: string;
  averageConfidence: number;
  severity: Severity;
  status: AnalysisStatus;
  error?: string;
  createdAt: string;
  results: ImageResultView[];
  recommendations: RecommendationView[];
  authoritativeRecommendationId: string | null;
  rejected?: RejectedImage[];
}

export interface AnalysisHistoryItem {
  analysisId: string;
  cropType: string;
  disease: string;
  confidence: string;
  averageConfidence: number;
  severity: Severity;
  status: AnalysisStatus;
  imageCount: number;
  createdAt: string;
}

export interface AnalysisHistoryPage {
  page: number;
  pageSize: number;
  hasMore: boolean;
  results: AnalysisHistoryItem[];
}

// 0.9333 -> "93%"
export function formatConfidence(value: number): string {
  return `${Math.round(value * 100)}%`;
}

function toImageResultView(result: ImageResult): ImageResultView {
  return {
    imageName: result.imageName,
    disease: result.diseaseDetected,
    crop: result.cropDetected,
    severity: result.severity,
    confidence: result.confidenceScore,
    ...(result.errorMessage ? { error: result.errorMessage } : {}),
  };
}

export function toRecommendationView(recommendation: Recommendation): RecommendationView {
  return {
    id: recommendation.id,
    generatedBy: recommendation.generatedBy,
    content: recommendation.content,
    status: recommendation.status,
    adminFeedback: recommendation.adminFeedback,
    createdAt: recommendation.createdAt.toISOString(),
    updatedAt: recommendation.updatedAt.toISOString(),
  };
}

export function composeAnalysisResult(
  analysis: Analysis,
  results: readonly ImageResult[],
  recommendations: readonly Recommendation[],
  rejected?: readonly RejectedImage[],
): AnalysisResult {
  const averageConfidence = analysis.averageConfidence ?? 0;
  const authoritative = selectAuthoritative(recommendations);

  return {
    analysisId: analysis.id,
    cropType: analysis.cropType,
    disease: dominantDisease(results),
    confidence: formatConfidence(averageConfidence),
    averageConfidence,
    severity: analysis.averageSeverity ?? "low",
    status: analysis.status,
    ...(analysis.errorMessage ? { error: analysis.errorMessage } : {}),
    createdAt: analysis.createdAt.toISOString(),
    results: results.map(toImageResultView),
    recommendations: recommendations.map(toRecommendationView),
    authoritativeRecommendationId: authoritative?.id ?? null,
    ...(rejected && rejected.length > 0 ? { rejected: [...rejected] } : {}),
  };
}

export function toHistoryItem(analysis: Analysis, results: readonly ImageResult[]): AnalysisHistoryItem {
  const averageConfidence = analysis.averageConfidence ?? 0;
  return {
    analysisId: analysis.id,
    cropType: analysis.cropType,
    disease: dominantDisease(results),
    confidence: formatConfidence(averageConfidence),
    averageConfidence,
    severity: analysis.averageSeverity ?? "low",
    status: analysis.status,
    imageCount: results.length,
    createdAt: analysis.createdAt.toISOString(),
  };
}
