import { Types } from "mongoose";
import { getAddress, sha256, toUtf8Bytes } from "ethers";
import ContractModel, { ContractDocument } from "../models/contract";
import AnalysisModel from "../models/analysis";
import FindingModel from "../models/finding";
import { toAnalysisRun } from "./analysisRepository";
import { AnalysisRun, ContractSource, Network, Severity } from "../types/analysis";
import HttpError from "../utils/httpError";

/** SHA-256 hex digest of the code text; identical code always maps to one contract. */
export const computeContentHash = (code: string): string => sha256(toUtf8Bytes(code)).slice(2);

export const normalizeAddress = (address: string): string => {
  if (!address) {
    throw new HttpError(400, "Address is required", undefined, "invalid_address");
  }
  try {
    return getAddress(address.trim()).toLowerCase();
  } catch (error) {
    throw new HttpError(
      400,
      "Invalid Ethereum address",
      { address, error: error instanceof Error ? error.message : error },
      "invalid_address"
    );
  }
};

export const toContractSource = (doc: ContractDocument): ContractSource => ({
  id: doc._id.toString(),
  name: doc.name,
  code: doc.code,
  codeHash: doc.codeHash,
  network: doc.network,
  address: doc.address ?? null,
  verified: doc.verified,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export interface EnsureContractInput {
  name: string;
  code: string;
  network?: Network;
  address?: string;
}

/** Returns the contract stored for this exact code text, creating it on first submission. */
export const ensureContract = async ({
  name,
  code,
  network = "polygon",
  address,
}: EnsureContractInput): Promise<ContractSource> => {
  const codeHash = computeContentHash(code);

  const contract = await ContractModel.findOneAndUpdate(
    { codeHash },
    {
      $setOnInsert: {
        name,
        code,
        codeHash,
        network,
        address: address ? normalizeAddress(address) : null,
      },
    },
    { new: true, upsert: true }
  ).exec();

  return toContractSource(contract);
};

export const getContractById = async (contractId: string): Promise<ContractSource | null> => {
  if (!Types.ObjectId.isValid(contractId)) return null;
  const contract = await ContractModel.findById(contractId).exec();
  return contract ? toContractSource(contract) : null;
};

export interface ContractSummary {
  id: string;
  name: string;
  network: Network;
  address: string | null;
  verified: boolean;
  createdAt: Date;
  latestRisk: Severity | null;
  analysisCount: number;
}

export const listContracts = async ({
  network,
  limit = 20,
  skip = 0,
}: {
  network?: Network;
  limit?: number;
  skip?: number;
}): Promise<{ total: number; data: ContractSummary[] }> => {
  const query = network ? { network } : {};

  const [total, contracts] = await Promise.all([
    ContractModel.countDocuments(query).exec(),
    ContractModel.find(query)
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(Math.min(limit, 100))
      .exec(),
  ]);

  const data = await Promise.all(
    contracts.map(async (contract): Promise<ContractSummary> => {
      const [latest, analysisCount] = await Promise.all([
        AnalysisModel.findOne({ contract: contract._id, status: "completed" })
          .sort({ createdAt: -1 })
          .exec(),
        AnalysisModel.countDocuments({ contract: contract._id }).exec(),
      ]);
      return {
        id: contract._id.toString(),
        name: contract.name,
        network: contract.network,
        address: contract.address ?? null,
        verified: contract.verified,
        createdAt: contract.createdAt,
        latestRisk: latest?.overallRisk ?? null,
        analysisCount,
      };
    })
  );

  return { total, data };
};

export const listAnalysesForContract = async (
  contractId: string,
  { limit = 10, skip = 0 }: { limit?: number; skip?: number } = {}
): Promise<{ total: number; data: AnalysisRun[] }> => {
  const contract = await getContractById(contractId);
  if (!contract) {
    throw new HttpError(404, "Contract not found", { contractId }, "not_found");
  }

  const filter = { contract: new Types.ObjectId(contract.id) };
  const [total, analyses] = await Promise.all([
    AnalysisModel.countDocuments(filter).exec(),
    AnalysisModel.find(filter)
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(Math.min(limit, 50))
      .exec(),
  ]);

  return { total, data: analyses.map(toAnalysisRun) };
};

/**
 * Deletes a contract together with its analyses and their findings.
 * Returns the ids of the deleted analyses, or null when the contract does not exist.
 */
export const deleteContract = async (contractId: string): Promise<string[] | null> => {
  const contract = await getContractById(contractId);
  if (!contract) return null;

  const contractObjectId = new Types.ObjectId(contract.id);
  const analyses = await AnalysisModel.find({ contract: contractObjectId }, { _id: 1 }).exec();
  const analysisIds = analyses.map((analysis) => analysis._id);

  await FindingModel.deleteMany({ analysis: { $in: analysisIds } }).exec();
  await AnalysisModel.deleteMany({ contract: contractObjectId }).exec();
  await ContractModel.deleteOne({ _id: contractObjectId }).exec();

  return analysisIds.map((id) => id.toString());
};

/** Contract lookups the analysis service depends on. */
export interface ContractStore {
  ensureContract(input: EnsureContractInput): Promise<ContractSource>;
  getContractById(contractId: string): Promise<ContractSource | null>;
  deleteContract(contractId: string): Promise<string[] | null>;
}

export const mongoContractStore: ContractStore = {
  ensureContract,
  getContractById,
  deleteContract,
};

export default {
  computeContentHash,
  ensureContract,
  getContractById,
  listContracts,
  listAnalysesForContract,
  deleteContract,
};
