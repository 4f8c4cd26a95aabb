import type { HealthResponse } from "../models/responses.js";

export class HealthController {
  /** Liveness check */
  public async getHealth(): Promise<HealthResponse> {
    return {
      status: "ok",
      uptime: process.uptime(),
    };
  }
}
