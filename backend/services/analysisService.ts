import type { AnalysisSettings } from "../config/env";
import {
  AnalysisJobPayload,
  AnalysisReport,
  AnalysisRun,
  AnalysisStatus,
  Network,
  isTerminalStatus,
} from "../types/analysis";
import { AIServiceError, AnalysisError, errorMessage } from "../utils/analysisErrors";
import logger from "../utils/logger";
import type { AnalysisRepository } from "./analysisRepository";
import type { AnalysisOrchestrator } from "./analysis/orchestrator";
import type { ModelClient } from "./analysis/modelClient";
import type { CachedAnalysisReport, ReportCache } from "./cacheService";
import type { ContractStore } from "./contractService";

export interface AnalyzeCodeRequest {
  name: string;
  code: string;
  network?: Network;
  address?: string;
}

export interface AnalysisProgress {
  analysisId: string;
  status: AnalysisStatus;
  progress: number;
  currentStep: string;
  stepsCompleted: string[];
  estimatedTimeRemainingMs: number | null;
}

const PROGRESS: Record<AnalysisStatus, { progress: number; currentStep: string; steps: string[] }> = {
  pending: { progress: 0, currentStep: "Waiting to start", steps: [] },
  processing: {
    progress: 50,
    currentStep: "Analyzing with AI",
    steps: ["Received contract", "Running AI analysis"],
  },
  completed: {
    progress: 100,
    currentStep: "Complete",
    steps: ["Received contract", "AI analysis complete", "Report generated"],
  },
  failed: { progress: 100, currentStep: "Failed", steps: ["Received contract", "Analysis failed"] },
};

const ESTIMATED_RUN_MS = 30_000;

export const describeProgress = (run: Pick<AnalysisRun, "id" | "status">): AnalysisProgress => {
  const entry = PROGRESS[run.status];
  return {
    analysisId: run.id,
    status: run.status,
    progress: entry.progress,
    currentStep: entry.currentStep,
    stepsCompleted: [...entry.steps],
    estimatedTimeRemainingMs: isTerminalStatus(run.status) ? null : ESTIMATED_RUN_MS,
  };
};

export interface AnalysisServiceDeps {
  repository: AnalysisRepository;
  contracts: ContractStore;
  orchestrator: AnalysisOrchestrator;
  modelClient: ModelClient;
  cache: ReportCache;
  publishJob: (payload: AnalysisJobPayload) => Promise<void>;
  settings: AnalysisSettings;
}

export type AnalysisReportResult = AnalysisReport | CachedAnalysisReport;

export const createAnalysisService = ({
  repository,
  contracts,
  orchestrator,
  modelClient,
  cache,
  publishJob,
  settings,
}: AnalysisServiceDeps) => {
  const createRunFor = async (request: AnalyzeCodeRequest) => {
    const contract = await contracts.ensureContract(request);
    const run = await repository.createRun({
      contractId: contract.id,
      detectionModel: settings.detectionModel,
      explanationModel: settings.explanationModel,
    });
    return { contract, run };
  };

  const buildReport = async (run: AnalysisRun): Promise<AnalysisReport | null> => {
    const contract = await contracts.getContractById(run.contractId);
    if (!contract) return null;
    const findings = await repository.listFindings(run.id);
    return {
      analysis: run,
      contract: { id: contract.id, name: contract.name, network: contract.network },
      findings,
    };
  };

  const cacheIfFinal = async (report: AnalysisReport): Promise<void> => {
    if (!isTerminalStatus(report.analysis.status)) return;
    try {
      await cache.setReport(report.analysis.id, report);
    } catch (error) {
      logger.warn({ analysisId: report.analysis.id, error }, "Failed to cache analysis report");
    }
  };

  const getAnalysisReport = async (analysisId: string): Promise<AnalysisReportResult | null> => {
    const cached = await cache.getReport(analysisId);
    if (cached) {
      return cached;
    }

    const run = await repository.loadRun(analysisId);
    if (!run) return null;
    const report = await buildReport(run);
    if (report) await cacheIfFinal(report);
    return report;
  };

  /** Runs a full analysis in-request. Throws the classified analysis errors. */
  const analyzeCode = async (request: AnalyzeCodeRequest): Promise<AnalysisReport> => {
    if (!(await modelClient.checkAvailability())) {
      throw new AIServiceError(
        "AI service (Ollama) is not available. Please make sure Ollama is running."
      );
    }

    const { contract, run } = await createRunFor(request);
    logger.debug({ analysisId: run.id, contractId: contract.id }, "Created analysis run");

    const completed = await orchestrator.runAnalysis(run.id, contract.code);
    const findings = await repository.listFindings(completed.id);
    const report: AnalysisReport = {
      analysis: completed,
      contract: { id: contract.id, name: contract.name, network: contract.network },
      findings,
    };
    await cacheIfFinal(report);
    return report;
  };

  /**
   * Creates a pending run and hands it to the worker through the job queue.
   * A run whose job could not be published is removed again.
   */
  const enqueueAnalysis = async (request: AnalyzeCodeRequest): Promise<AnalysisRun> => {
    const { contract, run } = await createRunFor(request);
    try {
      await publishJob({ analysisId: run.id, contractId: contract.id });
    } catch (error) {
      logger.error({ analysisId: run.id, error: errorMessage(error) }, "Failed to enqueue analysis job");
      await repository.deletePendingRun(run.id);
      throw new AnalysisError(`Could not enqueue analysis: ${errorMessage(error)}`);
    }
    return run;
  };

  const processAnalysisJob = async ({ analysisId, contractId }: AnalysisJobPayload): Promise<void> => {
    const contract = await contracts.getContractById(contractId);
    if (!contract) {
      // Deleting a contract removes its runs too, so there is nothing left to mark.
      logger.warn({ analysisId, contractId }, "Contract for analysis job no longer exists");
      return;
    }

    const completed = await orchestrator.runAnalysis(analysisId, contract.code);
    const report = await buildReport(completed);
    if (report) await cacheIfFinal(report);
  };

  const getAnalysisProgress = async (analysisId: string): Promise<AnalysisProgress | null> => {
    const run = await repository.loadRun(analysisId);
    return run ? describeProgress(run) : null;
  };

  const deleteContract = async (contractId: string): Promise<boolean> => {
    const analysisIds = await contracts.deleteContract(contractId);
    if (analysisIds === null) return false;
    await cache.evictReports(analysisIds);
    return true;
  };

  return {
    analyzeCode,
    enqueueAnalysis,
    processAnalysisJob,
    getAnalysisReport,
    getAnalysisProgress,
    deleteContract,
  };
};

export type AnalysisService = ReturnType<typeof createAnalysisService>;

export default createAnalysisService;
