import type { AppConfig } from "./config/env";
import getRedisClient from "./cache/redisClient";
import { createJobPublisher } from "./queue/kafka";
import { MongoAnalysisRepository } from "./services/analysisRepository";
import { OllamaClient } from "./services/analysis/modelClient";
import { AnalysisOrchestrator } from "./services/analysis/orchestrator";
import createAnalysisService from "./services/analysisService";
import createReportCache from "./services/cacheService";
import { mongoContractStore } from "./services/contractService";

/** Wires the process-wide collaborators from one configuration value. */
export const createContainer = (config: Readonly<AppConfig>) => {
  const repository = new MongoAnalysisRepository();
  const modelClient = new OllamaClient(config.ollama);
  const orchestrator = new AnalysisOrchestrator({
    repository,
    modelClient,
    settings: config.analysis,
  });
  const cache = createReportCache(getRedisClient(config.redisUrl), config.cacheTtlSeconds);

  const analysisService = createAnalysisService({
    repository,
    contracts: mongoContractStore,
    orchestrator,
    modelClient,
    cache,
    publishJob: createJobPublisher(config.kafka),
    settings: config.analysis,
  });

  return { modelClient, analysisService };
};

export type Container = ReturnType<typeof createContainer>;
