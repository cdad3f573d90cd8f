import { Router } from "express";
import { z } from "zod";
import type { AnalysisService } from "../services/analysisService";
import {
  getContractById,
  listAnalysesForContract,
  listContracts,
} from "../services/contractService";
import { NETWORKS } from "../types/analysis";
import asyncHandler from "../utils/asyncHandler";
import { notFound } from "../utils/httpError";

const pageNumber = z
  .string()
  .regex(/^\d+$/)
  .transform((value) => parseInt(value, 10))
  .optional();

export const createContractsRoutes = (analysisService: AnalysisService) => {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const querySchema = z.object({
        network: z.enum(NETWORKS).optional(),
        limit: pageNumber,
        skip: pageNumber,
      });

      const { network, limit, skip } = querySchema.parse(req.query);

      const options: Parameters<typeof listContracts>[0] = {
        limit: limit ?? 20,
        skip: skip ?? 0,
      };

      if (network) {
        options.network = network;
      }

      const result = await listContracts(options);
      res.json({ ...result, skip: options.skip, limit: options.limit });
    })
  );

  router.get(
    "/:contractId",
    asyncHandler(async (req, res) => {
      const { contractId } = req.params;
      if (!contractId) {
        return res.status(400).json({ error: "bad_request", message: "Contract ID is required" });
      }
      const contract = await getContractById(contractId);
      if (!contract) {
        throw notFound(`Contract with ID '${contractId}' not found`);
      }
      res.json(contract);
    })
  );

  router.delete(
    "/:contractId",
    asyncHandler(async (req, res) => {
      const { contractId } = req.params;
      if (!contractId) {
        return res.status(400).json({ error: "bad_request", message: "Contract ID is required" });
      }
      const deleted = await analysisService.deleteContract(contractId);
      if (!deleted) {
        throw notFound(`Contract with ID '${contractId}' not found`);
      }
      res.json({ success: true, message: "Contract and all its analyses have been deleted" });
    })
  );

  router.get(
    "/:contractId/analyses",
    asyncHandler(async (req, res) => {
      const { contractId } = req.params;
      if (!contractId) {
        return res.status(400).json({ error: "bad_request", message: "Contract ID is required" });
      }
      const querySchema = z.object({ limit: pageNumber, skip: pageNumber });
      const { limit, skip } = querySchema.parse(req.query);

      const result = await listAnalysesForContract(contractId, {
        limit: limit ?? 10,
        skip: skip ?? 0,
      });
      res.json({ contractId, ...result });
    })
  );

  return router;
};

export default createContractsRoutes;
