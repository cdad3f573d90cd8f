import express from "express";
import type { AppConfig } from "./config/env";
import type { Container } from "./container";
import createAnalysisRoutes from "./routes/analysisRoutes";
import createContractsRoutes from "./routes/contractsRoutes";
import errorHandler from "./middleware/errorHandler";
import asyncHandler from "./utils/asyncHandler";
import logger from "./utils/logger";

export const createApp = (config: Readonly<AppConfig>, { modelClient, analysisService }: Container) => {
  const app = express();

  app.use(express.json({ limit: `${config.maxCodeSizeKb + 64}kb` }));
  app.use(express.urlencoded({ extended: true }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - startedAt;
      logger.info(
        {
          method: req.method,
          path: req.originalUrl,
          statusCode: res.statusCode,
          durationMs: duration,
        },
        "request.completed"
      );
    });
    next();
  });

  app.get("/health", (_req, res) => res.json({ status: "ok" }));
  app.get(
    "/health/ai",
    asyncHandler(async (_req, res) => {
      const available = await modelClient.checkAvailability();
      res.status(available ? 200 : 503).json({ ollama: available ? "connected" : "disconnected" });
    })
  );

  app.use("/analyses", createAnalysisRoutes(analysisService, config));
  app.use("/contracts", createContractsRoutes(analysisService));

  app.use((_req, res, _next) => {
    res.status(404).json({ error: "not_found", message: "Route not found" });
  });

  app.use(errorHandler);

  return app;
};

export default createApp;
