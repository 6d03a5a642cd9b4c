import { err, ok, type Result } from "neverthrow";
import { deployedStatePath, parseRecord, readDeployedResources, type DeploymentRecord } from "../core/deployed.js";
import { InvalidRecordError, UnknownResourceTypeError, type DeployError } from "../core/errors.js";
import { generateReport } from "../core/reporter.js";
import { consoleUI, type UI } from "../core/ui.js";

export type StateOptions = {
  stage?: string;
  cwd?: string;
  json?: boolean;
  ui?: UI;
};

/** Prints what the last deployment of a stage recorded. */
export async function showState(options: StateOptions = {}): Promise<Result<void, DeployError>> {
  const cwd = options.cwd ?? process.cwd();
  const stage = options.stage ?? "dev";
  const ui = options.ui ?? consoleUI;

  const deployed = await readDeployedResources(cwd, stage);
  if (deployed.isErr()) {
    return err(deployed.error);
  }

  if (options.json === true) {
    ui.write(`${JSON.stringify(deployed.value.records, null, 2)}\n`);
    return ok(undefined);
  }
  if (deployed.value.records.length === 0) {
    ui.write(`Stage ${stage} has not been deployed.\n`);
    return ok(undefined);
  }
  let records: DeploymentRecord[];
  try {
    records = deployed.value.records.map(parseRecord);
  } catch (error) {
    if (error instanceof UnknownResourceTypeError || error instanceof InvalidRecordError) {
      return err({ kind: "state", message: error.message, path: deployedStatePath(cwd, stage) });
    }
    throw error;
  }
  ui.write(generateReport(records));
  return ok(undefined);
}
