import { AnalysisRequestSchema } from "../models/requests.js";
import type { AnalysisResponse } from "../models/responses.js";
import { AnalysisService } from "../services/analysis.service.js";

export class AnalysisController {
  constructor(private readonly service = new AnalysisService()) {}

  /** Compare the social optimum with the Nash split for one query */
  public async analyze(body: unknown): Promise<AnalysisResponse> {
    return this.service.analyze(AnalysisRequestSchema.parse(body));
  }
}
