/**
 * Image Intake Validator
 *
 * Screens a submitted batch before anything is persisted. Individual bad
 * images are filtered out and reported; the batch as a whole is refused when
 * it is empty, too large, or nothing in it survives screening.
 */

import sharp from "sharp";
import { MAX_IMAGE_NAME_LENGTH } from "../../shared/schema";
import { invalidInput } from "../utils/pipelineErrors";

export const SUPPORTED_FORMATS = ["jpeg", "png", "webp"] as const;
export type SupportedFormat = typeof SUPPORTED_FORMATS[number];

export const MIN_IMAGE_DIMENSION = 50;

// Mean per-channel pixel variance below this reads as a logo or a blank background
export const MIN_COLOUR_VARIANCE = 100;

export type RejectionReason =
  | "empty"
  | "too_large"
  | "undecodable"
  | "unsupported_format"
  | "too_small"
  | "not_plant_like";

export interface IncomingImage {
  name: string;
  mimeType?: string;
  data: Buffer;
}

export interface AcceptedImage {
  name: string;
  data: Buffer;
  format: SupportedFormat;
  width: number;
  height: number;
}

export interface RejectedImage {
  name: string;
  reason: RejectionReason;
  message: string;
}

export interface IntakeResult {
  accepted: AcceptedImage[];
  rejected: RejectedImage[];
}

export interface IntakeLimits {
  maxImageBytes: number;
  maxImagesPerSubmission: number | null;
}

const MAX_EXTENSION_LENGTH = 16;

/**
 * Client-supplied file name reduced to something storable: control characters
 * and directories are dropped and long names are shortened, keeping the
 * extension.
 */
export function normalizeImageName(raw: string): string {
  const base = raw.replace(/[\x00-\x1F\x7F]/g, "").split(/[\\/]/).pop()?.trim() ?? "";
  const name = base || "image";
  if (name.length <= MAX_IMAGE_NAME_LENGTH) return name;

  const dot = name.lastIndexOf(".");
  const extension = dot > 0 && name.length - dot <= MAX_EXTENSION_LENGTH ? name.slice(dot) : "";
  return name.slice(0, MAX_IMAGE_NAME_LENGTH - extension.length) + extension;
}

function isSupportedFormat(format: string | undefined): format is SupportedFormat {
  return SUPPORTED_FORMATS.some(supported => supported === format);
}

async function screen(image: IncomingImage, limits: IntakeLimits): Promise<AcceptedImage | RejectedImage> {
  const { data } = image;
  const name = normalizeImageName(image.name);

  if (data.length === 0) {
    return { name, reason: "empty", message: "Image is empty" };
  }

  if (data.length > limits.maxImageBytes) {
    const limitMb = Math.round((limits.maxImageBytes / (1024 * 1024)) * 10) / 10;
    return { name, reason: "too_large", message: `Image exceeds the ${limitMb}MB limit` };
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(data).metadata();
  } catch {
    return { name, reason: "undecodable", message: "Image could not be decoded" };
  }

  const { format, width, height } = metadata;
  if (!isSupportedFormat(format)) {
    return {
      name,
      reason: "unsupported_format",
      message: `Unsupported image format: ${format ?? "unknown"}. Use JPEG, PNG or WebP`,
    };
  }

  if (width === undefined || height === undefined) {
    return { name, reason: "undecodable", message: "Image dimensions could not be read" };
  }

  if (width < MIN_IMAGE_DIMENSION || height < MIN_IMAGE_DIMENSION) {
    return {
      name,
      reason: "too_small",
      message: `Image is ${width}x${height}px; at least ${MIN_IMAGE_DIMENSION}x${MIN_IMAGE_DIMENSION}px is required`,
    };
  }

  let stats: sharp.Stats;
  try {
    stats = await sharp(data).stats();
  } catch {
    return { name, reason: "undecodable", message: "Image could not be decoded" };
  }

  // Greyscale images carry no colour information to judge
  const colourChannels = stats.channels.slice(0, 3);
  if (colourChannels.length === 3) {
    const meanVariance = colourChannels.reduce((sum, channel) => sum + channel.stdev ** 2, 0) / 3;
    if (meanVariance < MIN_COLOUR_VARIANCE) {
      return {
        name,
        reason: "not_plant_like",
        message: "Image does not appear to contain plant-like content",
      };
    }
  }

  return { name, data, format, width, height };
}

function isRejected(outcome: AcceptedImage | RejectedImage): outcome is RejectedImage {
  return "reason" in outcome;
}

export class ImageIntakeValidator {
  constructor(private readonly limits: IntakeLimits) {}

  async validateBatch(images: readonly IncomingImage[]): Promise<IntakeResult> {
    if (images.length === 0) {
      throw invalidInput("At least one image is required");
    }

    const { maxImagesPerSubmission } = this.limits;
    if (maxImagesPerSubmission !== null && images.length > maxImagesPerSubmission) {
      throw invalidInput(`A submission may contain at most ${maxImagesPerSubmission} images`, {
        received: images.length,
        limit: maxImagesPerSubmission,
      });
    }

    const outcomes = await Promise.all(images.map(image => screen(image, this.limits)));

    const accepted: AcceptedImage[] = [];
    const rejected: RejectedImage[] = [];
    for (const outcome of outcomes) {
      if (isRejected(outcome)) {
        rejected.push(outcome);
      } else {
        accepted.push(outcome);
      }
    }

    if (accepted.length === 0) {
      throw invalidInput("No valid images in submission", { rejected });
    }

    return { accepted, rejected };
  }
}
