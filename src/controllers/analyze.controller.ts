import { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { renderAnalysis } from "../scraper/pipeline";
import { toJsonReport } from "../scraper/report";
import { AnalyzeDeps, analyzeUrl, topSchema, urlSchema } from "../services/analyze.service";
import { AppError } from "../utils/errors";

const analyzeSchema = z.object({
  url: urlSchema,
  top: topSchema.optional(),
});

export function createAnalyzeHandler(deps: AnalyzeDeps) {
  return async function analyzePage(req: Request, res: Response, next: NextFunction) {
    const parsed = analyzeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json(parsed.error.flatten());
      return;
    }

    try {
      const result = await analyzeUrl({ url: parsed.data.url, top: parsed.data.top }, deps);
      res.json({ report: renderAnalysis(result), result: toJsonReport(result) });
    } catch (err) {
      if (!(err instanceof AppError)) {
        next(err);
        return;
      }
      deps.logger?.warn(`Analyze failed for ${parsed.data.url}: ${err.message}`);
      res.status(err.status).json({ message: err.message });
    }
  };
}
