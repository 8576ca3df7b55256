import { initProjectConfig, type InitResult } from "../core/config-discovery.js";

import { emit, type OutputOptions } from "./output.js";

// =============================================================================
// INIT (project-scoped scaffolding)
// =============================================================================

export function initCommand(
  opts: { force?: boolean; cwd?: string },
  output: OutputOptions = { json: false },
): InitResult {
  const result = initProjectConfig({ cwd: opts.cwd, force: opts.force ?? false });

  emit(output, result, () => {
    if (result.status === "created") return [`Created taskweave config at ${result.configPath}`];
    if (result.status === "overwritten") {
      return [`Overwrote taskweave config at ${result.configPath}`];
    }
    return [
      `taskweave config already exists at ${result.configPath}`,
      "Pass --force to overwrite it with the defaults.",
    ];
  });

  return result;
}
