import { HydratedDocument, Schema, model } from "mongoose";
import { NETWORKS, Network } from "../types/analysis";

export interface ContractAttributes {
  name: string;
  code: string;
  codeHash: string;
  network: Network;
  address: string | null;
  verified: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type ContractDocument = HydratedDocument<ContractAttributes>;

const contractSchema = new Schema<ContractAttributes>(
  {
    name: { type: String, required: true, trim: true, maxlength: 255, index: true },
    code: { type: String, required: true },
    codeHash: { type: String, required: true },
    network: { type: String, required: true, enum: [...NETWORKS], default: "polygon" },
    address: { type: String, lowercase: true, default: null, index: true },
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

contractSchema.index({ codeHash: 1 }, { unique: true });
contractSchema.index({ createdAt: -1 });

export const ContractModel = model<ContractAttributes>("Contract", contractSchema);

export default ContractModel;
