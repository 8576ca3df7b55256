import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { makeTemporaryDirectory, removeTemporaryDirectories } from "../../test/helpers.js";

import {
  initProjectConfig,
  projectConfigPath,
  resolveProjectConfigPath,
  rootDirForConfig,
} from "./config-discovery.js";
import { loadProjectConfig } from "./config-loader.js";

afterEach(() => {
  removeTemporaryDirectories();
});

describe("resolveProjectConfigPath", () => {
  it("prefers an explicit path over the environment", () => {
    const cwd = makeTemporaryDirectory("config-discovery-");

    const resolved = resolveProjectConfigPath({
      explicitPath: "configs/dev.yaml",
      cwd,
      env: { TASKWEAVE_CONFIG: "/elsewhere/config.yaml" },
    });

    expect(resolved).toEqual({
      configPath: path.join(cwd, "configs", "dev.yaml"),
      source: "explicit",
      rootDir: path.join(cwd, "configs"),
    });
  });

  it("falls back to TASKWEAVE_CONFIG", () => {
    const cwd = makeTemporaryDirectory("config-discovery-");

    const resolved = resolveProjectConfigPath({
      cwd,
      env: { TASKWEAVE_CONFIG: "/srv/app/.taskweave/config.yaml" },
    });

    expect(resolved).toEqual({
      configPath: "/srv/app/.taskweave/config.yaml",
      source: "env",
      rootDir: "/srv/app",
    });
  });

  it("finds the project config under the working directory", () => {
    const cwd = makeTemporaryDirectory("config-discovery-");
    initProjectConfig({ cwd });

    expect(resolveProjectConfigPath({ cwd, env: {} })).toEqual({
      configPath: projectConfigPath(cwd),
      source: "project",
      rootDir: cwd,
    });
  });

  it("reports defaults when nothing is configured", () => {
    const cwd = makeTemporaryDirectory("config-discovery-");

    expect(resolveProjectConfigPath({ cwd, env: {} })).toEqual({
      configPath: null,
      source: "defaults",
      rootDir: cwd,
    });
  });
});

describe("rootDirForConfig", () => {
  it("maps a .taskweave config to its parent directory", () => {
    expect(rootDirForConfig("/work/app/.taskweave/config.yaml")).toBe("/work/app");
    expect(rootDirForConfig("/work/app/ops/config.yaml")).toBe("/work/app/ops");
  });
});

describe("initProjectConfig", () => {
  it("writes a config that loads cleanly and a local gitignore", () => {
    const cwd = makeTemporaryDirectory("config-init-");

    const result = initProjectConfig({ cwd });

    expect(result).toEqual({ rootDir: cwd, configPath: projectConfigPath(cwd), status: "created" });
    expect(fs.readFileSync(path.join(cwd, ".taskweave", ".gitignore"), "utf8")).toContain(
      "*.sqlite",
    );

    const config = loadProjectConfig(result.configPath, { rootDir: cwd, env: {} });
    expect(config.database_path).toBe(path.join(cwd, ".taskweave", "taskweave.sqlite"));
    expect(config.producer.provider).toBe("fallback");
  });

  it("leaves an existing config alone unless forced", () => {
    const cwd = makeTemporaryDirectory("config-init-");
    initProjectConfig({ cwd });
    fs.writeFileSync(projectConfigPath(cwd), "log_path: custom.jsonl\n", "utf8");

    expect(initProjectConfig({ cwd }).status).toBe("exists");
    expect(fs.readFileSync(projectConfigPath(cwd), "utf8")).toBe("log_path: custom.jsonl\n");

    expect(initProjectConfig({ cwd, force: true }).status).toBe("overwritten");
    expect(fs.readFileSync(projectConfigPath(cwd), "utf8")).toContain("database_path:");
  });
});
