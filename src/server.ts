import dotenv from "dotenv";
dotenv.config();
import { createApp } from "./app";
import { loadScraperConfig, loadServerConfig } from "./config/scraper";
import { createLogger } from "./utils/logger";

const config = loadScraperConfig();
const { port, rateLimitMax, corsOrigins } = loadServerConfig();
const logger = createLogger(config.logLevel);
const app = createApp({ config, logger, rateLimitMax, corsOrigins });

app.listen(port, () => {
  console.log(`Web frequencies API running on http://localhost:${port}`);
});
