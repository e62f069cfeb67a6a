import express, { type Request, Response, NextFunction } from "express";
import { registerRoutes } from "./routes";
import { createAuthMiddleware, getSession } from "./auth";
import { loadPipelineConfig } from "./config/pipelineConfig";
import { createAnalysisRateLimit } from "./rateLimiting";
import { safeLogger } from "./safe_logger";
import { storage } from "./storage";
import { AnalysisOrchestrator } from "./services/analysisOrchestrator";
import { ImageIntakeValidator } from "./services/imageIntakeValidator";
import { LocalImageStore } from "./services/imageStore";
import { InferenceAdapter } from "./services/inferenceAdapter";
import { createOpenAIRecommendationGenerator } from "./services/openaiRecommendationGenerator";
import { RecommendationAdapter } from "./services/recommendationAdapter";
import { ReviewWorkflow } from "./services/reviewWorkflow";
import { tfjsClassifierLoader } from "./services/tfjsClassifier";
import { errorMessage, isPipelineError, sendPipelineError } from "./utils/pipelineErrors";

// Fails fast on a bad environment before anything else starts
const config = loadPipelineConfig();

const app = express();
// Trust the first proxy so secure cookies are set correctly behind a load balancer
app.set("trust proxy", 1);
app.use(express.json({ limit: "1mb" }));
app.use(express.urlencoded({ extended: false }));
app.use(getSession());
app.use(safeLogger.createRequestLogger());

(async () => {
  const inference = new InferenceAdapter(tfjsClassifierLoader(config.modelPath));
  await inference.initialize();

  const generator = createOpenAIRecommendationGenerator({
    apiKey: config.openaiApiKey,
    model: config.openaiModel,
  });
  if (!generator) {
    safeLogger.warn("[Recommendation] OPENAI_API_KEY not set - recommendations will use templates");
  }

  const orchestrator = new AnalysisOrchestrator({
    storage,
    imageStore: new LocalImageStore(config.uploadDir),
    validator: new ImageIntakeValidator(config),
    inference,
    recommendations: new RecommendationAdapter(generator, { timeoutMs: config.recommendationTimeoutMs }),
    config,
  });

  const server = registerRoutes(app, {
    orchestrator,
    review: new ReviewWorkflow(storage),
    inference,
    auth: createAuthMiddleware(storage),
    analysisRateLimit: createAnalysisRateLimit(),
    limits: config,
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isPipelineError(err)) {
      sendPipelineError(res, err);
      return;
    }
    safeLogger.error("[API] Unhandled error", { error: errorMessage(err) });
    res.status(500).json({ message: "Internal Server Error" });
  });

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    safeLogger.info(`serving on port ${config.port}`);
  });
})().catch((error: unknown) => {
  safeLogger.error("[STARTUP] Failed to start server", { error: errorMessage(error) });
  process.exit(1);
});
