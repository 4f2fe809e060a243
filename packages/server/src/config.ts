/**
 * Server configuration
 *
 * Defaults live in DEFAULT_SERVER_CONFIG; the environment may override the
 * enabled toolsets and whether the profile catalog is built at startup.
 */

import { z } from "zod";

export const TOOLSETS = ["profiles", "atlas"] as const;

export type Toolset = (typeof TOOLSETS)[number];

export interface ServerConfig {
  name: string;
  version: string;
  toolsets: readonly Toolset[];
  /** Build the profile catalog before accepting connections */
  preload: boolean;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  name: "cocktail-aesthetics",
  version: "0.1.0",
  toolsets: TOOLSETS,
  preload: true
};

export class ServerConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid server configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ServerConfigError";
    this.issues = issues;
  }
}

// ========================================
// Environment parsing
// ========================================

const toolsetListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((part) => part.trim().toLowerCase())
      .filter((part) => part.length > 0)
  )
  .pipe(z.array(z.enum(TOOLSETS)).min(1, "expected at least one toolset"));

const booleanFlagSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["true", "false"]))
  .transform((value) => value === "true");

const envSchema = z.object({
  COCKTAIL_AESTHETICS_TOOLSETS: toolsetListSchema.optional(),
  COCKTAIL_AESTHETICS_PRELOAD: booleanFlagSchema.optional()
});

/**
 * Merges environment overrides into the defaults.
 *
 * @throws ServerConfigError when a variable is set to an unusable value
 */
export function resolveServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ServerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const { COCKTAIL_AESTHETICS_TOOLSETS: toolsets, COCKTAIL_AESTHETICS_PRELOAD: preload } = parsed.data;
  return {
    ...DEFAULT_SERVER_CONFIG,
    toolsets: toolsets ? [...new Set(toolsets)] : DEFAULT_SERVER_CONFIG.toolsets,
    preload: preload ?? DEFAULT_SERVER_CONFIG.preload
  };
}
