import type { CommandModule } from "yargs";

import { GlobalArgsSchema, defineCommand } from "@/cli/command";
import type { CliGlobalArgs } from "@/cli/types";
import { CLI_NAME, CLI_VERSION } from "@/cli/version";

export const versionCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = defineCommand({
  command: "version",
  describe: "Print the CLI version",
  args: GlobalArgsSchema,
  handler: (_args, ctx) => {
    (ctx.runtime.stdout ?? process.stdout).write(`${CLI_NAME} ${CLI_VERSION}\n`);
  },
});
