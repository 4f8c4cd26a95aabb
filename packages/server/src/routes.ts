/**
 * Route table: maps each endpoint to its controller method.
 */

import type { Express, NextFunction, Request, Response } from "express";
import { AnalysisController } from "./controllers/analysis.controller.js";
import { ConfigController } from "./controllers/config.controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { AnalysisService } from "./services/analysis.service.js";

export interface RouteOptions {
  /** Override for the configs/solver directory */
  configsRoot?: string;
}

type Handler = (req: Request) => Promise<unknown>;

/** Run a controller method and send its result as JSON; failures go to the error handler */
function handle(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req).then(
      (body) => {
        res.json(body);
      },
      (err: unknown) => {
        next(err);
      },
    );
  };
}

export function registerRoutes(app: Express, options: RouteOptions = {}): void {
  const health = new HealthController();
  const config = new ConfigController(options.configsRoot);
  const analysis = new AnalysisController(new AnalysisService(options.configsRoot));

  app.get("/health", handle(() => health.getHealth()));

  app.get(
    "/api/config/solver",
    handle((req) => {
      const profile = typeof req.query["profile"] === "string" ? req.query["profile"] : undefined;
      return config.getSolverConfig(profile);
    }),
  );
  app.get("/api/config/profiles", handle(() => config.getProfiles()));

  app.post("/api/analysis", handle((req) => analysis.analyze(req.body)));
}
