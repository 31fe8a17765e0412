import cors from "cors";
import express from "express";
import type { Express } from "express";
import { errorHandler } from "./http/error-handler";
import { silentLogger } from "./logger";
import { buildRoutes } from "./routes";
import type { RouteDeps } from "./routes";

export interface AppDeps extends RouteDeps {
  outputsDir: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const logger = deps.logger ?? silentLogger;

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.use("/api", buildRoutes(deps));
  app.use("/downloads", express.static(deps.outputsDir));
  app.use(errorHandler(logger));

  return app;
}
