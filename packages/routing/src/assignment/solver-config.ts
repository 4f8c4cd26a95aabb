/**
 * Layered JSON config system for the social-optimum solver.
 *
 * `configs/solver/base.json` holds the full set of solver options; named
 * profiles in `configs/solver/profiles/` hold partial overrides that are
 * spread on top of the base.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { ConfigError, NotFoundError } from "../domain/errors.js";
import { DEFAULT_SOCIAL_OPTIMUM_OPTIONS, type SocialOptimumOptions } from "./social-optimum.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SolverConfig = SocialOptimumOptions;

const SolverConfigSchema = z.object({
  maxIterations: z.number().int().positive(),
  tolerance: z.number().positive(),
  polishIterations: z.number().int().nonnegative(),
  polishTolerance: z.number().positive(),
});

const ProfileConfigSchema = z.object({
  name: z.string(),
  description: z.string(),
  overrides: SolverConfigSchema.partial(),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;

export interface ProfileInfo {
  name: string;
  description: string;
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/solver/`.
 * Works from both source (packages/routing/src/) and compiled (dist/) paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "solver");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  // Fallback: repo root relative to packages/routing/src/assignment
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "solver");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Read and validate one config file; any failure becomes a ConfigError */
function readConfigFile<T>(filePath: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read solver config: ${reason}`, filePath);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid solver config: ${issues}`, filePath);
  }
  return parsed.data;
}

/** Load the base solver config. Falls back to hardcoded defaults when absent. */
export function loadBaseSolverConfig(configsRoot = findConfigsRoot()): SolverConfig {
  const filePath = join(configsRoot, "base.json");
  if (!existsSync(filePath)) {
    return { ...DEFAULT_SOCIAL_OPTIMUM_OPTIONS };
  }
  return readConfigFile(filePath, SolverConfigSchema);
}

/** Load a profile and spread its overrides on top of the base. */
export function loadSolverConfig(
  profileName?: string,
  configsRoot = findConfigsRoot(),
): SolverConfig & { _profile?: ProfileInfo } {
  const base = loadBaseSolverConfig(configsRoot);
  if (!profileName) return base;

  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  if (!/^[\w-]+$/.test(profileName) || !existsSync(filePath)) {
    throw new NotFoundError(`Solver profile "${profileName}" does not exist`);
  }

  const profile = readConfigFile(filePath, ProfileConfigSchema);
  return {
    ...base,
    ...profile.overrides,
    _profile: { name: profile.name, description: profile.description },
  };
}

/** List all available profiles from the profiles directory. */
export function listSolverProfiles(configsRoot = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");

  if (!existsSync(profilesDir)) return [];

  const files = readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort();
  const profiles: ProfileInfo[] = [];

  for (const file of files) {
    try {
      const profile = readConfigFile(join(profilesDir, file), ProfileConfigSchema);
      profiles.push({ name: profile.name, description: profile.description });
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.warn(`[config] Skipping malformed solver profile ${file}`);
    }
  }

  return profiles;
}
