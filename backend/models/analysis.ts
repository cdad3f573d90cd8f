import { HydratedDocument, Schema, Types, model } from "mongoose";
import { ANALYSIS_STATUSES, AnalysisStatus, SEVERITIES, Severity } from "../types/analysis";

export interface AnalysisAttributes {
  contract: Types.ObjectId;
  status: AnalysisStatus;
  overallRisk: Severity | null;
  riskScore: number | null;
  summary: string | null;
  startedAt: Date | null;
  completedAt: Date | null;
  scanDurationMs: number | null;
  totalLines: number | null;
  functionsAnalyzed: number | null;
  detectionModel: string;
  explanationModel: string;
  errorMessage: string | null;
  errorDetails: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AnalysisDocument = HydratedDocument<AnalysisAttributes>;

const analysisSchema = new Schema<AnalysisAttributes>(
  {
    contract: {
      type: Schema.Types.ObjectId,
      ref: "Contract",
      required: true,
      index: true,
    },
    status: {
      type: String,
      enum: [...ANALYSIS_STATUSES],
      default: "pending",
      index: true,
    },
    overallRisk: { type: String, enum: [...SEVERITIES, null], default: null },
    riskScore: { type: Number, min: 0, max: 100, default: null },
    summary: { type: String, default: null },
    startedAt: { type: Date, default: null },
    completedAt: { type: Date, default: null },
    scanDurationMs: { type: Number, default: null },
    totalLines: { type: Number, default: null },
    functionsAnalyzed: { type: Number, default: null },
    detectionModel: { type: String, required: true },
    explanationModel: { type: String, required: true },
    errorMessage: { type: String, default: null },
    errorDetails: { type: String, default: null },
  },
  {
    timestamps: true,
    toJSON: {
      transform: (_doc, ret) => {
        ret.id = ret._id;
        Reflect.deleteProperty(ret, "_id");
        Reflect.deleteProperty(ret, "__v");
      },
    },
  }
);

analysisSchema.index({ contract: 1, createdAt: -1 });

export const AnalysisModel = model<AnalysisAttributes>("Analysis", analysisSchema);

export default AnalysisModel;
