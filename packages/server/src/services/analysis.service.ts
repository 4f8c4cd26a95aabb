/**
 * Analysis service: request graph -> solver config -> comparison JSON.
 */

import {
  analysisToJson,
  analyzeTraffic,
  buildGraph,
  graphFromGml,
  loadSolverConfig,
  type Graph,
} from "@flowlab/routing";
import type { AnalysisRequest, GraphRequest } from "../models/requests.js";
import type { AnalysisResponse } from "../models/responses.js";

export function graphFromRequest(request: GraphRequest): Graph {
  if ("gml" in request) {
    return graphFromGml(request.gml);
  }
  return buildGraph({ nodes: request.nodes, edges: request.edges });
}

export class AnalysisService {
  /** Override for the configs/solver directory (tests) */
  constructor(private readonly configsRoot?: string) {}

  analyze(request: AnalysisRequest): AnalysisResponse {
    const graph = graphFromRequest(request.graph);
    const { _profile, ...solver } = loadSolverConfig(request.profile, this.configsRoot);

    const analysis = analyzeTraffic(
      graph,
      { start: request.start, end: request.end, vehicles: request.vehicles },
      { solver, requireRoute: request.requireRoute ?? false },
    );

    const response: AnalysisResponse = analysisToJson(analysis);
    if (_profile) response.profile = _profile.name;
    return response;
  }
}
