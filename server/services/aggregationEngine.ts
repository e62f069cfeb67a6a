/**
 * Aggregation Engine
 *
 * Folds per-image inference outcomes into the analysis-level summary.
 * Policy: mean confidence over every image (error rows count as 0.0) and
 * maximum severity, so one badly diseased leaf is never averaged away by
 * healthy ones in the same batch.
 */

import type { Severity } from "../../shared/schema";
import { DEFAULT_SEVERITY_THRESHOLDS, type SeverityThresholds } from "../config/pipelineConfig";

export const HEALTHY_LABEL = "healthy";
export const UNKNOWN_LABEL = "unknown";
export const ERROR_LABEL = "error";

const SEVERITY_RANK: Record<Severity, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

export interface ScoredResult {
  diseaseDetected: string;
  cropDetected?: string | null;
  confidenceScore: number;
  severity: Severity;
}

export interface AnalysisSummary {
  averageConfidence: number;
  averageSeverity: Severity;
}

export function isHealthyLabel(label: string): boolean {
  return label.trim().toLowerCase().includes(HEALTHY_LABEL);
}

export function isErrorLabel(label: string): boolean {
  return label.trim().toLowerCase() === ERROR_LABEL;
}

/**
 * True when the label names an actual disease (not healthy, unknown or error).
 */
export function isDiseaseLabel(label: string): boolean {
  const normalized = label.trim().toLowerCase();
  if (normalized === "" || normalized === UNKNOWN_LABEL || normalized === ERROR_LABEL) {
    return false;
  }
  return !isHealthyLabel(normalized);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return compareSeverity(a, b) >= 0 ? a : b;
}

export function deriveSeverity(
  label: string,
  confidence: number,
  thresholds: SeverityThresholds = DEFAULT_SEVERITY_THRESHOLDS
): Severity {
  if (!isDiseaseLabel(label)) return "low";
  if (confidence >= thresholds.high) return "high";
  if (confidence >= thresholds.medium) return "medium";
  return "low";
}

export function aggregate(results: readonly ScoredResult[]): AnalysisSummary {
  if (results.length === 0) {
    return { averageConfidence: 0, averageSeverity: "low" };
  }

  let confidenceTotal = 0;
  let averageSeverity: Severity = "low";

  for (const result of results) {
    confidenceTotal += result.confidenceScore;
    // Non-disease rows never raise severity, whatever was stored for them
    const severity = isDiseaseLabel(result.diseaseDetected) ? result.severity : "low";
    averageSeverity = maxSeverity(averageSeverity, severity);
  }

  return {
    averageConfidence: confidenceTotal / results.length,
    averageSeverity,
  };
}

export function allFailed(results: readonly ScoredResult[]): boolean {
  return results.length > 0 && results.every(result => isErrorLabel(result.diseaseDetected));
}

/**
 * Most frequent disease in the batch; ties go to the larger summed
 * confidence, then to the first seen.
 */
export function dominantDisease(results: readonly ScoredResult[]): string {
  const tally = new Map<string, { count: number; confidence: number }>();

  for (const result of results) {
    if (!isDiseaseLabel(result.diseaseDetected)) continue;
    const entry = tally.get(result.diseaseDetected) ?? { count: 0, confidence: 0 };
    entry.count += 1;
    entry.confidence += result.confidenceScore;
    tally.set(result.diseaseDetected, entry);
  }

  let best: { label: string; count: number; confidence: number } | undefined;
  for (const [label, entry] of tally) {
    if (
      !best ||
      entry.count > best.count ||
      (entry.count === best.count && entry.confidence > best.confidence)
    ) {
      best = { label, ...entry };
    }
  }

  if (best) return best.label;
  return results.some(result => isHealthyLabel(result.diseaseDetected)) ? HEALTHY_LABEL : UNKNOWN_LABEL;
}

export function dominantCrop(results: readonly ScoredResult[]): string | undefined {
  const counts = new Map<string, number>();

  for (const result of results) {
    if (!result.cropDetected || isErrorLabel(result.diseaseDetected)) continue;
    counts.set(result.cropDetected, (counts.get(result.cropDetected) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [crop, count] of counts) {
    if (count > bestCount) {
      best = crop;
      bestCount = count;
    }
  }
  return best;
}
