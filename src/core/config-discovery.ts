import fs from "node:fs";
import path from "node:path";

// =============================================================================
// CONSTANTS
// =============================================================================

export const PROJECT_DIR = ".taskweave";
const PROJECT_CONFIG_FILE = "config.yaml";
export const CONFIG_ENV_VAR = "TASKWEAVE_CONFIG";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "project" | "defaults";

export type ConfigResolution = {
  /** Null when no config file was found and defaults apply. */
  configPath: string | null;
  source: ConfigSource;
  /** Directory that relative storage paths resolve against. */
  rootDir: string;
};

export type InitResult = {
  rootDir: string;
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Lookup order: explicit path, then $TASKWEAVE_CONFIG, then <cwd>/.taskweave/config.yaml.
 * When none applies the caller falls back to built-in defaults rooted at cwd.
 */
export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): ConfigResolution {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const env = args.env ?? process.env;

  if (args.explicitPath) {
    const configPath = path.resolve(cwd, args.explicitPath);
    return { configPath, source: "explicit", rootDir: rootDirForConfig(configPath) };
  }

  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv && fromEnv.length > 0) {
    const configPath = path.resolve(cwd, fromEnv);
    return { configPath, source: "env", rootDir: rootDirForConfig(configPath) };
  }

  const projectConfig = projectConfigPath(cwd);
  if (fs.existsSync(projectConfig)) {
    return { configPath: projectConfig, source: "project", rootDir: cwd };
  }

  return { configPath: null, source: "defaults", rootDir: cwd };
}

export function projectConfigPath(rootDir: string): string {
  return path.join(rootDir, PROJECT_DIR, PROJECT_CONFIG_FILE);
}

/**
 * A config kept at <root>/.taskweave/config.yaml belongs to <root>; a config anywhere
 * else belongs to the directory it sits in.
 */
export function rootDirForConfig(configPath: string): string {
  const configDir = path.dirname(configPath);
  return path.basename(configDir) === PROJECT_DIR ? path.dirname(configDir) : configDir;
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const rootDir = path.resolve(args.cwd ?? process.cwd());
  const configPath = projectConfigPath(rootDir);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  const configDir = path.dirname(configPath);
  fs.mkdirSync(configDir, { recursive: true });
  ensureLocalGitignore(configDir, { force });

  if (hasConfig && !force) {
    return { rootDir, configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, defaultProjectConfigYaml(), "utf8");

  const status = hasConfig && force ? "overwritten" : "created";
  return { rootDir, configPath, status };
}

// =============================================================================
// INTERNALS
// =============================================================================

function ensureLocalGitignore(configDir: string, opts: { force: boolean }): void {
  const ignorePath = path.join(configDir, ".gitignore");
  if (fs.existsSync(ignorePath) && !opts.force) return;

  const content = ["# Local task database and event log", "*.sqlite", "*.sqlite-*", "*.jsonl", ""].join(
    "\n",
  );
  fs.writeFileSync(ignorePath, content, "utf8");
}

function defaultProjectConfigYaml(): string {
  return [
    "# Taskweave project configuration",
    "#",
    "# Loaded from <project>/.taskweave/config.yaml, $TASKWEAVE_CONFIG, or --config <path>.",
    "# Relative paths resolve from the project directory. Env vars like ${HOME} are allowed.",
    "",
    "database_path: .taskweave/taskweave.sqlite",
    "log_path: .taskweave/events.jsonl",
    "",
    "scheduling:",
    "  # Duration used for tasks without an estimate.",
    "  default_estimate_hours: 1.0",
    "  # Reject a dependency that would close a cycle instead of reporting it later.",
    "  enforce_acyclic: false",
    "  # How many actionable tasks the status summary lists.",
    "  summary_action_limit: 3",
    "",
    "# Plan and spec generation: fallback | openai | anthropic | mock",
    "producer:",
    "  provider: fallback",
    "  model: gpt-4o",
    "  # temperature: 0.2",
    "  # timeout_ms: 60000",
    "  # api_key: ${OPENAI_API_KEY}",
    "",
  ].join("\n");
}
