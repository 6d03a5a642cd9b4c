import { command } from "cleye";
import { formatDeployError } from "../../core/errors.js";
import { showState } from "../state.js";

export const stateCommand = command(
  {
    name: "state",
    help: {
      description: "Show the resources recorded by the last deployment of a stage",
    },
    parameters: ["[stage]"],
    flags: {
      projectDir: {
        type: String,
        description: "Project directory (default: current directory)",
      },
      json: {
        type: Boolean,
        description: "Print the raw records as JSON",
      },
    },
  },
  async (argv) => {
    const result = await showState({
      stage: argv._.stage,
      cwd: argv.flags.projectDir,
      json: argv.flags.json,
    });
    if (result.isErr()) {
      console.error(`Error: ${formatDeployError(result.error)}`);
      process.exitCode = 1;
    }
  },
);
