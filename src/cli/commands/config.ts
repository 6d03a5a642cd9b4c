import { command } from "cleye";
import { formatDeployError } from "../../core/errors.js";
import { showConfig } from "../config.js";

export const configCommand = command(
  {
    name: "config",
    help: {
      description: "Validate .converge/config.json and print the settings for a stage",
    },
    parameters: ["[stage]"],
    flags: {
      projectDir: {
        type: String,
        description: "Project directory (default: current directory)",
      },
    },
  },
  async (argv) => {
    const result = await showConfig({ stage: argv._.stage, cwd: argv.flags.projectDir });
    if (result.isErr()) {
      console.error(`Error: ${formatDeployError(result.error)}`);
      process.exitCode = 1;
    }
  },
);
