import { z } from "zod";
import type { AnalysisSettings } from "../../config/env";
import { buildDetectionPrompt, buildExplanationPrompt } from "../../prompts";
import {
  AnalysisRun,
  ExplanationFields,
  RawFinding,
  isRecord,
} from "../../types/analysis";
import { AIServiceError, AnalysisError, errorMessage } from "../../utils/analysisErrors";
import logger from "../../utils/logger";
import type { AnalysisRepository } from "../analysisRepository";
import { measureCode } from "./codeMetrics";
import {
  EMPTY_EXPLANATION,
  attachExplanation,
  normalizeFinding,
  readExplanation,
  readText,
} from "./findingNormalizer";
import type { ModelClient } from "./modelClient";
import { parseModelResponse } from "./responseParser";
import { highestSeverity, riskScore } from "./riskAggregator";
import { transitionRun } from "./runLifecycle";

export const DETECTION_PARSE_FAILURE = "Failed to parse AI detection response";

const detectionPayloadSchema = z.object({
  vulnerabilities: z.array(z.unknown()).catch([]),
  summary: z.string().optional().catch(undefined),
});

export interface OrchestratorDeps {
  repository: AnalysisRepository;
  modelClient: ModelClient;
  settings: AnalysisSettings;
  now?: () => Date;
}

interface DetectionResult {
  findings: RawFinding[];
  summary: string | null;
}

const describeFinding = (raw: RawFinding) => ({
  category: readText(raw.type) ?? readText(raw.category) ?? "other",
  severity: readText(raw.severity) ?? "medium",
  functionName: readText(raw.function_name) ?? "unknown",
  vulnerableCode: readText(raw.vulnerable_code) ?? "",
  briefReason: readText(raw.brief_reason) ?? "",
});

/**
 * Drives one analysis run through detection, per-finding explanation,
 * normalization, aggregation and persistence. The run always leaves this
 * class in a terminal state.
 */
export class AnalysisOrchestrator {
  private readonly repository: AnalysisRepository;
  private readonly modelClient: ModelClient;
  private readonly settings: AnalysisSettings;
  private readonly now: () => Date;

  constructor({ repository, modelClient, settings, now = () => new Date() }: OrchestratorDeps) {
    this.repository = repository;
    this.modelClient = modelClient;
    this.settings = settings;
    this.now = now;
  }

  async runAnalysis(analysisId: string, contractCode: string): Promise<AnalysisRun> {
    const processing = await this.claim(analysisId);
    logger.info({ analysisId }, "Analysis started");

    try {
      const completed = await this.execute(processing, contractCode);
      logger.info(
        { analysisId, riskScore: completed.riskScore, overallRisk: completed.overallRisk },
        "Analysis completed"
      );
      return completed;
    } catch (error) {
      await this.markFailed(processing, error);
      if (error instanceof AIServiceError || error instanceof AnalysisError) {
        throw error;
      }
      throw new AnalysisError(`Analysis failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Moves a pending run to processing. The write only lands while the stored
   * run is still pending, so a redelivered job cannot start the run twice.
   */
  private async claim(analysisId: string): Promise<AnalysisRun> {
    try {
      const run = await this.repository.loadRun(analysisId);
      if (!run) {
        throw new AnalysisError(`Analysis ${analysisId} not found`);
      }
      if (run.status !== "pending") {
        throw new AnalysisError(`Analysis ${analysisId} is already ${run.status}`);
      }

      const processing = transitionRun(run, "processing", { startedAt: this.now() });
      await this.repository.saveRun(processing, "pending");
      return processing;
    } catch (error) {
      if (error instanceof AnalysisError) throw error;
      throw new AnalysisError(`Analysis failed: ${errorMessage(error)}`);
    }
  }

  private async execute(run: AnalysisRun, contractCode: string): Promise<AnalysisRun> {
    const detection = await this.detect(contractCode);
    const explanations = await this.explainAll(run.id, detection.findings, contractCode);

    for (const [index, raw] of detection.findings.entries()) {
      const explanation = explanations[index] ?? EMPTY_EXPLANATION;
      await this.repository.addFinding(run.id, attachExplanation(normalizeFinding(raw), explanation));
    }

    const completedAt = this.now();
    const startedAt = run.startedAt ?? completedAt;
    const completed = transitionRun(run, "completed", {
      overallRisk: highestSeverity(detection.findings),
      riskScore: riskScore(detection.findings),
      summary: detection.summary ?? `Found ${detection.findings.length} potential vulnerabilities`,
      completedAt,
      scanDurationMs: completedAt.getTime() - startedAt.getTime(),
      ...measureCode(contractCode),
    });
    await this.repository.saveRun(completed, "processing");
    return completed;
  }

  private async detect(contractCode: string): Promise<DetectionResult> {
    const { systemPrompt, userPrompt } = buildDetectionPrompt(contractCode);
    const raw = await this.modelClient.invoke(this.settings.detectionModel, systemPrompt, userPrompt);
    const parsed = parseModelResponse(raw);
    if (!parsed.ok) {
      throw new AnalysisError(DETECTION_PARSE_FAILURE, parsed.raw);
    }

    const payload = detectionPayloadSchema.parse(parsed.value);
    const summary = payload.summary !== undefined && payload.summary.trim() !== "" ? payload.summary : null;
    return { findings: payload.vulnerabilities.filter(isRecord), summary };
  }

  /**
   * Explanations run in batches of `explanationConcurrency`. A failed call
   * only leaves its own finding without explanation fields.
   */
  private async explainAll(
    analysisId: string,
    findings: RawFinding[],
    contractCode: string
  ): Promise<ExplanationFields[]> {
    const results: ExplanationFields[] = [];
    const batchSize = Math.max(1, this.settings.explanationConcurrency);

    for (let start = 0; start < findings.length; start += batchSize) {
      const batch = findings.slice(start, start + batchSize);
      const settled = await Promise.allSettled(batch.map((raw) => this.explain(raw, contractCode)));

      settled.forEach((outcome, offset) => {
        if (outcome.status === "fulfilled") {
          results[start + offset] = outcome.value;
          return;
        }
        logger.warn(
          { analysisId, findingIndex: start + offset, error: errorMessage(outcome.reason) },
          "Explanation failed, keeping detection fields only"
        );
        results[start + offset] = EMPTY_EXPLANATION;
      });
    }

    return results;
  }

  private async explain(raw: RawFinding, contractCode: string): Promise<ExplanationFields> {
    const { systemPrompt, userPrompt } = buildExplanationPrompt({
      ...describeFinding(raw),
      contractCode,
    });
    const response = await this.modelClient.invoke(
      this.settings.explanationModel,
      systemPrompt,
      userPrompt
    );
    const parsed = parseModelResponse(response);
    if (!parsed.ok) {
      logger.warn({ snippet: parsed.raw }, "Explanation response could not be parsed");
      return EMPTY_EXPLANATION;
    }
    return readExplanation(parsed.value);
  }

  private async markFailed(run: AnalysisRun, error: unknown): Promise<void> {
    const details =
      error instanceof AnalysisError && typeof error.details === "string" ? error.details : null;
    const failed = transitionRun(run, "failed", {
      completedAt: this.now(),
      errorMessage: errorMessage(error),
      errorDetails: details,
    });

    try {
      await this.repository.saveRun(failed, "processing");
    } catch (saveError) {
      logger.error(
        { analysisId: run.id, error: errorMessage(saveError) },
        "Could not record analysis failure"
      );
    }
    logger.error({ analysisId: run.id, error: errorMessage(error) }, "Analysis failed");
  }
}

export default AnalysisOrchestrator;
