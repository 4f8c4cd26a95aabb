import type { TrafficAnalysisJson } from "@flowlab/routing";

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface AnalysisResponse extends TrafficAnalysisJson {
  /** Solver profile used, when one was requested */
  profile?: string;
}

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
