import { cli } from "cleye";
import { configCommand } from "./commands/config.js";
import { stateCommand } from "./commands/state.js";

const VERSION = "0.1.0";

export const run = (argv: string[]): void => {
  const parsed = cli(
    {
      name: "converge",
      version: VERSION,
      commands: [stateCommand, configCommand],
    },
    undefined,
    argv,
  );
  if (parsed.command === undefined) {
    parsed.showHelp();
  }
};
