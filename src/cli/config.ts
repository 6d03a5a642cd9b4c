import { err, ok, type Result } from "neverthrow";
import { configPath, readConfig, resolveStageConfig } from "../core/config.js";
import type { DeployError } from "../core/errors.js";
import { consoleUI, type UI } from "../core/ui.js";

export type ConfigOptions = {
  stage?: string;
  cwd?: string;
  ui?: UI;
};

/** Validates the project config and prints the settings one stage deploys with. */
export async function showConfig(options: ConfigOptions = {}): Promise<Result<void, DeployError>> {
  const cwd = options.cwd ?? process.cwd();
  const ui = options.ui ?? consoleUI;

  const config = await readConfig(configPath(cwd));
  if (config.isErr()) {
    return err(config.error);
  }

  const resolved = resolveStageConfig(config.value, options.stage ?? "dev");
  ui.write(`${JSON.stringify(resolved, null, 2)}\n`);
  return ok(undefined);
}
