import { err, ok, type Result } from "neverthrow";
import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { deployedStatePath, SCHEMA_VERSION } from "./deployed.js";
import type { DeployError } from "./errors.js";
import type { ResourceValues } from "./executor.js";

export type DeployedState = {
  readonly resources: readonly ResourceValues[];
  readonly schema_version: string;
  readonly backend: string;
};

export const toDeployedState = (resources: readonly ResourceValues[]): DeployedState => ({
  resources,
  schema_version: SCHEMA_VERSION,
  backend: "api",
});

/**
 * Writes the resource values of a successful deployment to the stage's state
 * file and returns its path. Other stages' files are not touched.
 */
export const recordResults = async (
  resources: readonly ResourceValues[],
  stage: string,
  projectDir: string,
): Promise<Result<string, DeployError>> => {
  const path = deployedStatePath(projectDir, stage);
  try {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, `${JSON.stringify(toDeployedState(resources), null, 2)}\n`);
  } catch (error) {
    return err({ kind: "io", message: `Failed to write deployed state: ${String(error)}`, path });
  }
  return ok(path);
};
