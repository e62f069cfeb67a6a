/**
 * Pipeline configuration
 *
 * Parsed once from the environment at startup and shared read-only by every
 * request. Invalid values abort startup with the offending variable named.
 */

import { z } from "zod";

export interface SeverityThresholds {
  medium: number;
  high: number;
}

export interface PipelineConfig {
  maxImageBytes: number;
  maxUploadBytes: number; // whole request, every image included
  maxImagesPerSubmission: number | null; // null = unbounded
  severityThresholds: SeverityThresholds;
  recommendationTimeoutMs: number;
  inferenceConcurrency: number;
  modelPath: string;
  uploadDir: string;
  openaiApiKey?: string;
  openaiModel: string;
  port: number;
}

const MB = 1024 * 1024;

const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  MAX_IMAGE_SIZE_MB: z.preprocess(blankAsUndefined, z.coerce.number().positive().default(12)),
  MAX_UPLOAD_SIZE_MB: z.preprocess(blankAsUndefined, z.coerce.number().positive().default(100)),
  MAX_IMAGES_PER_SUBMISSION: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  SEVERITY_MEDIUM_THRESHOLD: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).default(0.5)),
  SEVERITY_HIGH_THRESHOLD: z.preprocess(blankAsUndefined, z.coerce.number().min(0).max(1).default(0.85)),
  RECOMMENDATION_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(5000)),
  INFERENCE_CONCURRENCY: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(32).default(4)),
  MODEL_PATH: z.preprocess(blankAsUndefined, z.string().default("models/crop-disease")),
  UPLOAD_DIR: z.preprocess(blankAsUndefined, z.string().default("uploads/analysis_images")),
  OPENAI_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  OPENAI_MODEL: z.preprocess(blankAsUndefined, z.string().default("gpt-4o-mini")),
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().min(1).max(65535).default(5000)),
}).refine(env => env.SEVERITY_HIGH_THRESHOLD > env.SEVERITY_MEDIUM_THRESHOLD, {
  message: "must be greater than SEVERITY_MEDIUM_THRESHOLD",
  path: ["SEVERITY_HIGH_THRESHOLD"],
}).refine(env => env.MAX_UPLOAD_SIZE_MB >= env.MAX_IMAGE_SIZE_MB, {
  message: "must be at least MAX_IMAGE_SIZE_MB",
  path: ["MAX_UPLOAD_SIZE_MB"],
});

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map(issue => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid pipeline configuration - ${problems}`);
  }

  const values = parsed.data;

  return Object.freeze({
    maxImageBytes: Math.floor(values.MAX_IMAGE_SIZE_MB * MB),
    maxUploadBytes: Math.floor(values.MAX_UPLOAD_SIZE_MB * MB),
    maxImagesPerSubmission: values.MAX_IMAGES_PER_SUBMISSION ?? null,
    severityThresholds: Object.freeze({
      medium: values.SEVERITY_MEDIUM_THRESHOLD,
      high: values.SEVERITY_HIGH_THRESHOLD,
    }),
    recommendationTimeoutMs: values.RECOMMENDATION_TIMEOUT_MS,
    inferenceConcurrency: values.INFERENCE_CONCURRENCY,
    modelPath: values.MODEL_PATH,
    uploadDir: values.UPLOAD_DIR,
    openaiApiKey: values.OPENAI_API_KEY,
    openaiModel: values.OPENAI_MODEL,
    port: values.PORT,
  });
}

export const DEFAULT_SEVERITY_THRESHOLDS: SeverityThresholds = Object.freeze({
  medium: 0.5,
  high: 0.85,
});
