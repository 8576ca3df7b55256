import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { isPlainObject } from "./utils.js";

export type LoadProjectConfigOptions = {
  /** Directory that relative `database_path` and `log_path` resolve against. */
  rootDir: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Reads a YAML project config, substitutes `${VAR}` references, validates it and anchors
 * relative storage paths at `rootDir`. Every failure surfaces as a config-coded
 * UserFacingError; the underlying ConfigError is kept as its cause.
 */
export function loadProjectConfig(configPath: string, opts: LoadProjectConfigOptions): ProjectConfig {
  const file = path.resolve(configPath);
  if (!fse.pathExistsSync(file)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `Project config not found at ${file}.`,
      hint: "Run `taskweave init` in the project directory or pass --config <path>.",
    });
  }

  try {
    const document = parseYaml(file, readConfigText(file));
    const substituted = substituteEnv(document ?? {}, opts.env ?? process.env, file, []);
    return resolveConfigPaths(validateConfig(file, substituted), opts.rootDir);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Project config at ${file} is invalid.`,
      hint: "Fix the config file and rerun. For a fresh config, run `taskweave init --force`.",
      cause: err,
    });
  }
}

export function resolveConfigPaths(config: ProjectConfig, rootDir: string): ProjectConfig {
  const inMemory = config.database_path === ":memory:";

  return {
    ...config,
    database_path: inMemory ? config.database_path : path.resolve(rootDir, config.database_path),
    log_path: path.resolve(rootDir, config.log_path),
  };
}

// =============================================================================
// STAGES
// =============================================================================

function readConfigText(file: string): string {
  try {
    return fse.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(`Failed to read project config at ${file}`, err);
  }
}

function parseYaml(file: string, text: string): unknown {
  try {
    return yaml.load(text);
  } catch (err) {
    if (!(err instanceof yaml.YAMLException)) {
      throw new ConfigError(`Failed to parse YAML config at ${file}: ${String(err)}`, err);
    }
    const at = `line ${err.mark.line + 1}, column ${err.mark.column + 1}`;
    throw new ConfigError(`Failed to parse YAML config at ${file} (${at}): ${err.message}`, err);
  }
}

const ENV_REFERENCE = /\$\{([A-Z0-9_]+)\}/gi;

function substituteEnv(
  value: unknown,
  env: NodeJS.ProcessEnv,
  file: string,
  keyPath: readonly string[],
): unknown {
  if (typeof value === "string") {
    return value.replace(ENV_REFERENCE, (_reference, name: string) => {
      const replacement = env[name];
      if (replacement !== undefined) return replacement;

      const where = keyPath.length > 0 ? keyPath.join(".") : "<root>";
      throw new ConfigError(
        `Environment variable ${name} is not set but is referenced in ${file} (${where}).`,
      );
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => substituteEnv(item, env, file, [...keyPath, String(index)]));
  }

  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = substituteEnv(item, env, file, [...keyPath, key]);
    }
    return out;
  }

  return value;
}

function validateConfig(file: string, document: unknown): ProjectConfig {
  const result = ProjectConfigSchema.safeParse(document);
  if (result.success) return result.data;

  const lines = result.error.issues.map(describeIssue).join("\n");
  throw new ConfigError(`Invalid project config at ${file}:\n${lines}`, result.error);
}

function describeIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";

  switch (issue.code) {
    case "invalid_type":
      return `${where}: Expected ${issue.expected}, received ${issue.received}`;
    case "invalid_enum_value": {
      const allowed = issue.options.map((option) => JSON.stringify(option)).join(", ");
      return `${where}: Expected one of ${allowed}, received ${JSON.stringify(issue.received)}`;
    }
    case "unrecognized_keys":
      return `${where}: Unrecognized keys: ${issue.keys.join(", ")}`;
    default:
      return `${where}: ${issue.message}`;
  }
}
