import type { Express, Request, RequestHandler, Response } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import type { ZodError } from "zod";
import type { AuthMiddleware, AuthenticatedUser } from "./auth";
import type { PipelineConfig } from "./config/pipelineConfig";
import { safeLogger } from "./safe_logger";
import type { AnalysisOrchestrator } from "./services/analysisOrchestrator";
import { formatConfidence, toRecommendationView } from "./services/analysisResult";
import type { InferenceAdapter } from "./services/inferenceAdapter";
import type { ReviewWorkflow } from "./services/reviewWorkflow";
import {
  errorMessage,
  invalidInput,
  isPipelineError,
  sendPipelineError,
} from "./utils/pipelineErrors";
import {
  adminRecommendationSchema,
  historyQuerySchema,
  reviewRecommendationSchema,
  submitAnalysisSchema,
} from "./validation";

export interface RouteServices {
  orchestrator: AnalysisOrchestrator;
  review: ReviewWorkflow;
  inference: Pick<InferenceAdapter, "isDegraded" | "isReady">;
  auth: AuthMiddleware;
  analysisRateLimit: RequestHandler;
  limits: Pick<PipelineConfig, "maxUploadBytes" | "maxImagesPerSubmission">;
}

function sendValidationError(res: Response, error: ZodError): void {
  sendPipelineError(res, invalidInput("Validation error", {
    errors: error.errors.map(issue => ({ path: issue.path.join("."), message: issue.message })),
  }));
}

function handleRouteError(res: Response, error: unknown, failureMessage: string): void {
  if (isPipelineError(error)) {
    sendPipelineError(res, error);
    return;
  }
  safeLogger.error(`[API] ${failureMessage}`, { error: errorMessage(error) });
  res.status(500).json({ message: failureMessage });
}

// isAuthenticated has already populated req.user on every route that calls this
function requireUser(req: Request, res: Response): AuthenticatedUser | undefined {
  if (!req.user) {
    res.status(401).json({ message: "Unauthorized" });
    return undefined;
  }
  return req.user;
}

/**
 * Aborts when the client disconnects before the response is written.
 */
function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function registerRoutes(app: Express, services: RouteServices): Server {
  const { orchestrator, review, inference, auth, analysisRateLimit, limits } = services;
  const { isAuthenticated, isAdmin } = auth;

  // Oversized images are reported per item by the intake validator, so the
  // transport only enforces the whole-request cap
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: limits.maxUploadBytes,
      ...(limits.maxImagesPerSubmission !== null ? { files: limits.maxImagesPerSubmission + 1 } : {}),
    },
  });
  const uploadLimitMb = Math.round((limits.maxUploadBytes / (1024 * 1024)) * 10) / 10;

  const receiveImages: RequestHandler = (req, res, next) => {
    const declaredLength = Number(req.headers["content-length"]);
    if (Number.isFinite(declaredLength) && declaredLength > limits.maxUploadBytes) {
      sendPipelineError(res, invalidInput(`Upload exceeds the ${uploadLimitMb}MB request limit`, {
        limit: limits.maxUploadBytes,
      }));
      return;
    }

    upload.array("images")(req, res, (error: unknown) => {
      if (error instanceof multer.MulterError) {
        sendPipelineError(res, invalidInput(`Upload rejected: ${error.message}`, { code: error.code }));
        return;
      }
      if (error) {
        next(error);
        return;
      }
      next();
    });
  };

  app.get("/api/health", (_req, res) => {
    res.json({
      status: inference.isReady() ? "ok" : "starting",
      inference: inference.isDegraded() ? "degraded" : "ready",
    });
  });

  // ============== ANALYSIS ROUTES ==============

  app.post("/api/analysis/upload", isAuthenticated, analysisRateLimit, receiveImages, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    const parsed = submitAnalysisSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    const files = Array.isArray(req.files) ? req.files : [];
    const images = files.map(file => ({
      name: file.originalname,
      mimeType: file.mimetype,
      data: file.buffer,
    }));

    try {
      const result = await orchestrator.submit(user, images, parsed.data.cropType, {
        signal: abortOnDisconnect(res),
      });
      res.status(201).json(result);
    } catch (error) {
      handleRouteError(res, error, "Failed to analyze images");
    }
  });

  app.get("/api/analysis/history", isAuthenticated, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      res.json(await orchestrator.getHistory(user, parsed.data));
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch analysis history");
    }
  });

  app.get("/api/analysis/:id", isAuthenticated, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    try {
      res.json(await orchestrator.getDetail(user, req.params.id));
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch analysis");
    }
  });

  app.post("/api/analysis/:id/recommendations", isAuthenticated, analysisRateLimit, async (req, res) => {
    const user = requireUser(req, res);
    if (!user) return;

    try {
      const result = await orchestrator.regenerateRecommendation(user, req.params.id, {
        signal: abortOnDisconnect(res),
      });
      res.status(201).json(result);
    } catch (error) {
      handleRouteError(res, error, "Failed to generate recommendation");
    }
  });

  // ============== ADMIN REVIEW ROUTES ==============

  app.get("/api/admin/recommendations/pending", isAuthenticated, isAdmin, async (_req, res) => {
    try {
      const pending = await review.listPending();
      res.json(pending.map(recommendation => ({
        ...toRecommendationView(recommendation),
        analysis: {
          analysisId: recommendation.analysis.id,
          cropType: recommendation.analysis.cropType,
          severity: recommendation.analysis.averageSeverity ?? "low",
          confidence: formatConfidence(recommendation.analysis.averageConfidence ?? 0),
          status: recommendation.analysis.status,
          createdAt: recommendation.analysis.createdAt.toISOString(),
        },
      })));
    } catch (error) {
      handleRouteError(res, error, "Failed to fetch pending recommendations");
    }
  });

  app.post("/api/admin/recommendations/:id/review", isAuthenticated, isAdmin, async (req, res) => {
    const admin = requireUser(req, res);
    if (!admin) return;

    const parsed = reviewRecommendationSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const updated = await review.review(admin, req.params.id, parsed.data.action, parsed.data.feedback);
      res.json(toRecommendationView(updated));
    } catch (error) {
      handleRouteError(res, error, "Failed to review recommendation");
    }
  });

  app.post("/api/admin/analysis/:id/recommendations", isAuthenticated, isAdmin, async (req, res) => {
    const admin = requireUser(req, res);
    if (!admin) return;

    const parsed = adminRecommendationSchema.safeParse(req.body);
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }

    try {
      const recommendation = await review.createAdminRecommendation(admin, req.params.id, parsed.data.content);
      res.status(201).json(toRecommendationView(recommendation));
    } catch (error) {
      handleRouteError(res, error, "Failed to create recommendation");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
