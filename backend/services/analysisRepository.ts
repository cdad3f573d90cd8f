import { Types } from "mongoose";
import AnalysisModel, { AnalysisDocument } from "../models/analysis";
import FindingModel, { FindingDocument } from "../models/finding";
import { AnalysisRun, AnalysisStatus, Finding, FindingDraft } from "../types/analysis";
import { AnalysisError } from "../utils/analysisErrors";

export interface CreateRunInput {
  contractId: string;
  detectionModel: string;
  explanationModel: string;
}

/** Storage the orchestrator writes runs and findings through. */
export interface AnalysisRepository {
  createRun(input: CreateRunInput): Promise<AnalysisRun>;
  loadRun(id: string): Promise<AnalysisRun | null>;
  /**
   * Full-record update of the mutable run fields, applied only while the stored
   * status still equals `expectedStatus`. Throws `AnalysisError` otherwise.
   */
  saveRun(run: AnalysisRun, expectedStatus: AnalysisStatus): Promise<void>;
  /** Removes a run that never left `pending`. */
  deletePendingRun(id: string): Promise<void>;
  addFinding(runId: string, finding: FindingDraft): Promise<Finding>;
  listFindings(runId: string): Promise<Finding[]>;
}

export const toAnalysisRun = (doc: AnalysisDocument): AnalysisRun => ({
  id: doc._id.toString(),
  contractId: doc.contract.toString(),
  status: doc.status,
  overallRisk: doc.overallRisk ?? null,
  riskScore: doc.riskScore ?? null,
  summary: doc.summary ?? null,
  startedAt: doc.startedAt ?? null,
  completedAt: doc.completedAt ?? null,
  scanDurationMs: doc.scanDurationMs ?? null,
  totalLines: doc.totalLines ?? null,
  functionsAnalyzed: doc.functionsAnalyzed ?? null,
  detectionModel: doc.detectionModel,
  explanationModel: doc.explanationModel,
  errorMessage: doc.errorMessage ?? null,
  errorDetails: doc.errorDetails ?? null,
  createdAt: doc.createdAt,
});

export const toFinding = (doc: FindingDocument): Finding => ({
  id: doc._id.toString(),
  analysisId: doc.analysis.toString(),
  category: doc.category,
  severity: doc.severity,
  confidence: doc.confidence,
  lineStart: doc.lineStart ?? null,
  lineEnd: doc.lineEnd ?? null,
  functionName: doc.functionName ?? null,
  codeSnippet: doc.codeSnippet ?? null,
  briefReason: doc.briefReason ?? null,
  description: doc.description ?? null,
  impact: doc.impact ?? null,
  recommendation: doc.recommendation ?? null,
  fixedCode: doc.fixedCode ?? null,
  verified: doc.verified,
  createdAt: doc.createdAt,
});

export class MongoAnalysisRepository implements AnalysisRepository {
  async createRun({ contractId, detectionModel, explanationModel }: CreateRunInput): Promise<AnalysisRun> {
    const doc = await AnalysisModel.create({
      contract: new Types.ObjectId(contractId),
      status: "pending",
      detectionModel,
      explanationModel,
    });
    return toAnalysisRun(doc);
  }

  async loadRun(id: string): Promise<AnalysisRun | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const doc = await AnalysisModel.findById(id).exec();
    return doc ? toAnalysisRun(doc) : null;
  }

  async saveRun(run: AnalysisRun, expectedStatus: AnalysisStatus): Promise<void> {
    const updated = await AnalysisModel.findOneAndUpdate(
      { _id: new Types.ObjectId(run.id), status: expectedStatus },
      {
        $set: {
          status: run.status,
          overallRisk: run.overallRisk,
          riskScore: run.riskScore,
          summary: run.summary,
          startedAt: run.startedAt,
          completedAt: run.completedAt,
          scanDurationMs: run.scanDurationMs,
          totalLines: run.totalLines,
          functionsAnalyzed: run.functionsAnalyzed,
          errorMessage: run.errorMessage,
          errorDetails: run.errorDetails,
        },
      },
      { new: true }
    ).exec();

    if (!updated) {
      throw new AnalysisError(`Analysis ${run.id} is missing or no longer ${expectedStatus}`);
    }
  }

  async deletePendingRun(id: string): Promise<void> {
    if (!Types.ObjectId.isValid(id)) return;
    await AnalysisModel.deleteOne({ _id: new Types.ObjectId(id), status: "pending" }).exec();
  }

  async addFinding(runId: string, finding: FindingDraft): Promise<Finding> {
    const doc = await FindingModel.create({ ...finding, analysis: new Types.ObjectId(runId) });
    return toFinding(doc);
  }

  async listFindings(runId: string): Promise<Finding[]> {
    if (!Types.ObjectId.isValid(runId)) return [];
    const docs = await FindingModel.find({ analysis: new Types.ObjectId(runId) })
      .sort({ _id: 1 })
      .exec();
    return docs.map(toFinding);
  }
}

export default MongoAnalysisRepository;
