/**
 * Read-only status API.
 *
 * Express app over the pipeline snapshot. Nothing here changes engine
 * state.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { Server } from "node:http";
import type { Logger } from "../logging/logger";
import { createStatusRouter, type StatusSource } from "./routes/status";

export function createStatusApp(source: StatusSource, logger: Logger): Express {
  const app = express();

  // Middleware
  app.use(cors());

  // Request logging
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  app.use("/api", createStatusRouter(source));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("Status API error", { error: err.message });
    res.status(500).json({
      error: "Internal server error",
      message: err.message,
    });
  });

  return app;
}

export function startStatusServer(
  source: StatusSource,
  port: number,
  logger: Logger
): Promise<Server> {
  const app = createStatusApp(source, logger);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Status API listening on http://localhost:${port}/api/health`);
      resolve(server);
    });
    server.on("error", reject);
  });
}
