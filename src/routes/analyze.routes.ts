import { Router } from "express";
import { createAnalyzeHandler } from "../controllers/analyze.controller";
import { AnalyzeDeps } from "../services/analyze.service";

export function createAnalyzeRouter(deps: AnalyzeDeps) {
  const analyzeRouter = Router();
  analyzeRouter.post("/analyze", createAnalyzeHandler(deps));
  return analyzeRouter;
}
