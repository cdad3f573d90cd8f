import { HydratedDocument, Schema, Types, model } from "mongoose";
import {
  CONFIDENCE_LEVELS,
  FindingDraft,
  SEVERITIES,
  VULNERABILITY_CATEGORIES,
} from "../types/analysis";

export interface FindingAttributes extends FindingDraft {
  analysis: Types.ObjectId;
  createdAt: Date;
  updatedAt: Date;
}

export type FindingDocument = HydratedDocument<FindingAttributes>;

const nullableText = { type: String, default: null };

const findingSchema = new Schema<FindingAttributes>(
  {
    analysis: {
      type: Schema.Types.ObjectId,
      ref: "Analysis",
      required: true,
      index: true,
    },
    category: { type: String, required: true, enum: [...VULNERABILITY_CATEGORIES] },
    severity: { type: String, required: true, enum: [...SEVERITIES] },
    confidence: { type: String, required: true, enum: [...CONFIDENCE_LEVELS], default: "medium" },
    lineStart: { type: Number, default: null },
    lineEnd: { type: Number, default: null },
    functionName: nullableText,
    codeSnippet: nullableText,
    briefReason: nullableText,
    description: nullableText,
    impact: nullableText,
    recommendation: nullableText,
    fixedCode: nullableText,
    verified: { type: Boolean, default: false },
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

export const FindingModel = model<FindingAttributes>("Finding", findingSchema);

export default FindingModel;
