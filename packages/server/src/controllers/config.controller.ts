import { listSolverProfiles, loadSolverConfig, type SolverConfig } from "@flowlab/routing";
import type { ProfileListItem } from "../models/responses.js";

export class ConfigController {
  constructor(private readonly configsRoot?: string) {}

  /** Base solver settings, or a named profile merged on top */
  public async getSolverConfig(profile?: string): Promise<SolverConfig> {
    const { _profile, ...config } = loadSolverConfig(profile, this.configsRoot);
    return config;
  }

  /** List all available solver profiles */
  public async getProfiles(): Promise<ProfileListItem[]> {
    return listSolverProfiles(this.configsRoot);
  }
}
