import express, { ErrorRequestHandler } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { createApiRouter } from "./routes";
import { isOriginAllowed, staticCorsOrigins } from "./config/cors";
import { ServerConfig } from "./config/scraper";
import { AnalyzeDeps } from "./services/analyze.service";
import { AppError, ForbiddenError } from "./utils/errors";

export type AppOptions = AnalyzeDeps &
  Partial<Omit<ServerConfig, "port">> & {
    requestLogs?: boolean;
  };

export function createApp(options: AppOptions) {
  const app = express();
  const origins = options.corsOrigins ?? staticCorsOrigins();

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: options.rateLimitMax ?? 300,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(helmet());

  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin) return callback(null, true); // non-browser or same-origin
        if (isOriginAllowed(origin, origins)) return callback(null, true);
        return callback(new ForbiddenError("Not allowed by CORS"), false);
      },
    })
  );

  app.use(limiter);
  if (options.requestLogs ?? true) app.use(morgan("dev"));

  app.use(express.json({ limit: "100kb" }));

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api", createApiRouter(options));

  const errorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
    const status = err instanceof AppError ? err.status : typeof err?.status === "number" ? err.status : 500;
    if (status >= 500) options.logger?.error(`Unhandled error: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
    res.status(status).json({ message: err instanceof Error && err.message ? err.message : "Internal server error" });
  };
  app.use(errorHandler);

  return app;
}
