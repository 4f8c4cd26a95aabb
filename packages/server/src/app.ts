import express from "express";
import cors from "cors";
import { registerRoutes, type RouteOptions } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";

export { type RouteOptions } from "./routes.js";

export function createApp(options: RouteOptions = {}): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app, options);

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
