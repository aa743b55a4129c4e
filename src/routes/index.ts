import { Router } from "express";
import { AnalyzeDeps } from "../services/analyze.service";
import { createAnalyzeRouter } from "./analyze.routes";

export function createApiRouter(deps: AnalyzeDeps) {
  const apiRouter = Router();
  apiRouter.use("/", createAnalyzeRouter(deps));
  return apiRouter;
}
