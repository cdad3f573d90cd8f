import { Router } from "express";
import { z } from "zod";
import type { AppConfig } from "../config/env";
import type { AnalysisService } from "../services/analysisService";
import { NETWORKS } from "../types/analysis";
import asyncHandler from "../utils/asyncHandler";
import { notFound } from "../utils/httpError";

const contractCodeSchema = (maxCodeSizeKb: number) =>
  z
    .string()
    .min(10)
    .refine((code) => Buffer.byteLength(code, "utf8") <= maxCodeSizeKb * 1024, {
      message: `Code must not exceed ${maxCodeSizeKb} KB`,
    })
    .refine((code) => /pragma\s+solidity/i.test(code), {
      message: "Code must contain a 'pragma solidity' statement",
    })
    .refine((code) => /(contract|interface|library)\s+\w+/i.test(code), {
      message: "Code must contain a contract, interface, or library definition",
    });

export const createAnalysisRoutes = (analysisService: AnalysisService, config: Readonly<AppConfig>) => {
  const router = Router();

  const analyzeSchema = z.object({
    contract_name: z.string().trim().min(1).max(255),
    contract_code: contractCodeSchema(config.maxCodeSizeKb),
    network: z.enum(NETWORKS).default("polygon"),
    address: z.string().optional(),
    async: z.boolean().optional(),
  });

  router.post(
    "/",
    asyncHandler(async (req, res) => {
      const payload = analyzeSchema.parse(req.body);
      const request: Parameters<typeof analysisService.analyzeCode>[0] = {
        name: payload.contract_name,
        code: payload.contract_code,
        network: payload.network,
      };

      if (payload.address) {
        request.address = payload.address;
      }

      if (payload.async) {
        const analysis = await analysisService.enqueueAnalysis(request);
        return res.status(202).json({ analysis });
      }

      const report = await analysisService.analyzeCode(request);
      res.status(201).json(report);
    })
  );

  router.get(
    "/:analysisId",
    asyncHandler(async (req, res) => {
      const { analysisId } = req.params;
      if (!analysisId) {
        return res.status(400).json({ error: "bad_request", message: "Analysis ID is required" });
      }
      const report = await analysisService.getAnalysisReport(analysisId);
      if (!report) {
        throw notFound(`Analysis with ID '${analysisId}' not found`);
      }
      res.json(report);
    })
  );

  router.get(
    "/:analysisId/status",
    asyncHandler(async (req, res) => {
      const { analysisId } = req.params;
      if (!analysisId) {
        return res.status(400).json({ error: "bad_request", message: "Analysis ID is required" });
      }
      const progress = await analysisService.getAnalysisProgress(analysisId);
      if (!progress) {
        throw notFound(`Analysis with ID '${analysisId}' not found`);
      }
      res.json(progress);
    })
  );

  return router;
};

export default createAnalysisRoutes;
