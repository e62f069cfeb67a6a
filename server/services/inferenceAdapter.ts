/**
 * Inference Adapter
 *
 * Process-wide wrapper around the image classifier. The classifier is loaded
 * once at startup; when no model can be loaded the adapter runs in degraded
 * mode and answers every image with an "unknown" prediction at 0.0
 * confidence, so the rest of the pipeline keeps working without a model.
 */

import { safeLogger } from "../safe_logger";
import { errorMessage } from "../utils/pipelineErrors";
import { ERROR_LABEL, HEALTHY_LABEL, UNKNOWN_LABEL } from "./aggregationEngine";

export interface Prediction {
  label: string;
  confidence: number;
}

export interface Classifier {
  classify(image: Buffer): Promise<Prediction>;
}

/**
 * Resolves to the classifier, or to null when no model is installed.
 * Rejections are treated the same as a missing model.
 */
export type ClassifierLoader = () => Promise<Classifier | null>;

export type InferenceOutcome =
  | { kind: "prediction"; label: string; crop: string | null; confidence: number }
  | { kind: "error"; label: typeof ERROR_LABEL; crop: null; confidence: 0; error: string };

export interface NormalizedLabel {
  crop: string | null;
  disease: string;
}

const CLASS_SEPARATOR = "___";

// Dataset crop classes whose raw names read badly in results
const CROP_DISPLAY_NAMES: Record<string, string> = {
  "corn (maize)": "Maize",
  "cherry (including sour)": "Cherry",
  "pepper, bell": "Bell Pepper",
};

function titleCase(value: string): string {
  return value
    .split(" ")
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

function cleanLabelPart(value: string): string {
  return value.replace(/_/g, " ").replace(/\s+/g, " ").trim();
}

/**
 * Model classes are either plain disease names or "Crop___Disease" pairs
 * (e.g. "Tomato___Late_blight" -> crop "Tomato", disease "Late Blight").
 */
export function normalizeLabel(rawLabel: string): NormalizedLabel {
  const separatorAt = rawLabel.indexOf(CLASS_SEPARATOR);

  if (separatorAt === -1) {
    const disease = cleanLabelPart(rawLabel);
    if (disease === "") return { crop: null, disease: UNKNOWN_LABEL };
    return { crop: null, disease: disease.toLowerCase().includes(HEALTHY_LABEL) ? HEALTHY_LABEL : disease };
  }

  const cropPart = titleCase(cleanLabelPart(rawLabel.slice(0, separatorAt)));
  const crop = CROP_DISPLAY_NAMES[cropPart.toLowerCase()] ?? cropPart;
  const diseasePart = cleanLabelPart(rawLabel.slice(separatorAt + CLASS_SEPARATOR.length));

  let disease: string;
  if (diseasePart === "") {
    disease = UNKNOWN_LABEL;
  } else if (diseasePart.toLowerCase().includes(HEALTHY_LABEL)) {
    disease = HEALTHY_LABEL;
  } else {
    disease = titleCase(diseasePart);
  }

  return { crop: crop === "" ? null : crop, disease };
}

function clampConfidence(confidence: number): number {
  if (!Number.isFinite(confidence)) return 0;
  return Math.min(1, Math.max(0, confidence));
}

export class InferenceAdapter {
  private classifier: Classifier | null = null;
  private initialization: Promise<void> | null = null;
  private degraded = false;
  private degradedWarningLogged = false;

  constructor(private readonly loadClassifier: ClassifierLoader) {}

  /**
   * Loads the classifier. Concurrent callers share one in-flight load and
   * later calls are no-ops.
   */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.load();
    }
    return this.initialization;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  isReady(): boolean {
    return this.initialization !== null && (this.classifier !== null || this.degraded);
  }

  async infer(image: Buffer): Promise<InferenceOutcome> {
    await this.initialize();

    if (!this.classifier) {
      return { kind: "prediction", label: UNKNOWN_LABEL, crop: null, confidence: 0 };
    }

    try {
      const prediction = await this.classifier.classify(image);
      const { crop, disease } = normalizeLabel(prediction.label);
      return {
        kind: "prediction",
        label: disease,
        crop,
        confidence: clampConfidence(prediction.confidence),
      };
    } catch (error) {
      const message = errorMessage(error);
      safeLogger.error("[Inference] Classification failed for image", { error: message });
      return { kind: "error", label: ERROR_LABEL, crop: null, confidence: 0, error: message };
    }
  }

  private async load(): Promise<void> {
    try {
      const classifier = await this.loadClassifier();
      if (classifier) {
        this.classifier = classifier;
        safeLogger.info("[Inference] Classifier loaded");
        return;
      }
      this.enterDegradedMode("no model installed");
    } catch (error) {
      this.enterDegradedMode(errorMessage(error));
    }
  }

  private enterDegradedMode(reason: string): void {
    this.degraded = true;
    if (!this.degradedWarningLogged) {
      this.degradedWarningLogged = true;
      safeLogger.warn(`[Inference] Running in degraded mode - every image will be reported as "${UNKNOWN_LABEL}"`, { reason });
    }
  }
}
