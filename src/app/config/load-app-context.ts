import { defaultProjectConfig, type ProjectConfig } from "../../core/config.js";
import { resolveProjectConfigPath, type ConfigSource } from "../../core/config-discovery.js";
import { loadProjectConfig, resolveConfigPaths } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ResolvedProjectConfig = {
  config: ProjectConfig;
  configPath: string | null;
  source: ConfigSource;
  rootDir: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Finds the config file the way every command does and loads it. With no file anywhere,
 * the defaults apply, anchored at the working directory.
 */
export function resolveAppConfig(args: LoadAppContextArgs = {}): ResolvedProjectConfig {
  const env = args.env ?? process.env;
  const resolved = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
    env,
  });

  const config =
    resolved.configPath === null
      ? resolveConfigPaths(defaultProjectConfig(), resolved.rootDir)
      : loadProjectConfig(resolved.configPath, { rootDir: resolved.rootDir, env });

  return { config, ...resolved };
}

/** Opens the store, event log and producers for the resolved config. Callers close it. */
export function loadAppContext(args: LoadAppContextArgs = {}): AppContext {
  const resolved = resolveAppConfig(args);
  return createAppContext({
    rootDir: resolved.rootDir,
    configPath: resolved.configPath,
    config: resolved.config,
    env: args.env,
  });
}
