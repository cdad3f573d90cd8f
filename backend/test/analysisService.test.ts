import * as assert from "assert";
import type { AnalysisSettings } from "../config/env";
import { AnalysisOrchestrator } from "../services/analysis/orchestrator";
import { createAnalysisService } from "../services/analysisService";
import type { ReportCache } from "../services/cacheService";
import type { ContractStore, EnsureContractInput } from "../services/contractService";
import { AnalysisJobPayload, ContractSource } from "../types/analysis";
import { AIServiceError, AnalysisError } from "../utils/analysisErrors";
import { InMemoryAnalysisRepository } from "./support/inMemoryRepository";
import { ScriptedModelClient } from "./support/scriptedModelClient";

const SETTINGS: AnalysisSettings = {
  detectionModel: "detector-model",
  explanationModel: "explainer-model",
  explanationConcurrency: 2,
};

const CODE = "pragma solidity ^0.8.0; contract Vault {}";

class InMemoryContractStore implements ContractStore {
  readonly contracts = new Map<string, ContractSource>();

  async ensureContract({ name, code, network = "polygon", address }: EnsureContractInput): Promise<ContractSource> {
    const existing = [...this.contracts.values()].find((contract) => contract.code === code);
    if (existing) return existing;
    const contract: ContractSource = {
      id: `contract-${this.contracts.size + 1}`,
      name,
      code,
      codeHash: `hash-${this.contracts.size + 1}`,
      network,
      address: address ?? null,
      verified: false,
      createdAt: new Date("2024-01-01T00:00:00.000Z"),
      updatedAt: new Date("2024-01-01T00:00:00.000Z"),
    };
    this.contracts.set(contract.id, contract);
    return contract;
  }

  async getContractById(contractId: string): Promise<ContractSource | null> {
    return this.contracts.get(contractId) ?? null;
  }

  async deleteContract(contractId: string): Promise<string[] | null> {
    return this.contracts.delete(contractId) ? [] : null;
  }
}

class InMemoryReportCache implements ReportCache {
  readonly reports = new Map<string, Record<string, unknown>>();

  async getReport(analysisId: string): Promise<Record<string, unknown> | null> {
    return this.reports.get(analysisId) ?? null;
  }

  async setReport(analysisId: string): Promise<void> {
    this.reports.set(analysisId, { analysisId });
  }

  async evictReports(analysisIds: readonly string[]): Promise<void> {
    analysisIds.forEach((id) => this.reports.delete(id));
  }
}

suite("Analysis service", () => {
  let repository: InMemoryAnalysisRepository;
  let contracts: InMemoryContractStore;
  let modelClient: ScriptedModelClient;
  let published: AnalysisJobPayload[];

  const serviceWith = (publishJob: (payload: AnalysisJobPayload) => Promise<void>) =>
    createAnalysisService({
      repository,
      contracts,
      orchestrator: new AnalysisOrchestrator({ repository, modelClient, settings: SETTINGS }),
      modelClient,
      cache: new InMemoryReportCache(),
      publishJob,
      settings: SETTINGS,
    });

  setup(() => {
    repository = new InMemoryAnalysisRepository();
    contracts = new InMemoryContractStore();
    modelClient = new ScriptedModelClient(() => JSON.stringify({ vulnerabilities: [] }));
    published = [];
  });

  test("enqueues a pending run and publishes its job", async () => {
    const service = serviceWith(async (payload) => {
      published.push(payload);
    });

    const run = await service.enqueueAnalysis({ name: "Vault", code: CODE });

    assert.strictEqual(run.status, "pending");
    assert.strictEqual(run.detectionModel, "detector-model");
    assert.deepStrictEqual(published, [{ analysisId: run.id, contractId: "contract-1" }]);
    assert.strictEqual(repository.runs.get(run.id)?.status, "pending");
  });

  test("removes the pending run when its job cannot be published", async () => {
    const service = serviceWith(async () => {
      throw new Error("broker unavailable");
    });

    await assert.rejects(service.enqueueAnalysis({ name: "Vault", code: CODE }), (error: unknown) => {
      assert.ok(error instanceof AnalysisError);
      assert.strictEqual(error.message, "Could not enqueue analysis: broker unavailable");
      return true;
    });
    assert.strictEqual(repository.runs.size, 0);
    assert.deepStrictEqual(repository.writes, ["run:deleted"]);
  });

  test("processes a published job to completion", async () => {
    const service = serviceWith(async (payload) => {
      published.push(payload);
    });
    const run = await service.enqueueAnalysis({ name: "Vault", code: CODE });
    const [job] = published;
    assert.ok(job);

    await service.processAnalysisJob(job);

    assert.strictEqual(repository.runs.get(run.id)?.status, "completed");
    const progress = await service.getAnalysisProgress(run.id);
    assert.strictEqual(progress?.progress, 100);
  });

  test("refuses a synchronous analysis while the model service is down", async () => {
    modelClient.available = false;
    const service = serviceWith(async () => undefined);

    await assert.rejects(service.analyzeCode({ name: "Vault", code: CODE }), AIServiceError);
    assert.strictEqual(repository.runs.size, 0);
    assert.strictEqual(modelClient.calls.length, 0);
  });
});
