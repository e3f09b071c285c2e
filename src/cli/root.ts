import yargs from "yargs/yargs";
import type { Argv } from "yargs";

import { formatError } from "@/util/errors";
import { exitCodeForError } from "@/util/exitCodes";
import { authCommand } from "./commands/auth";
import { budgetCommand } from "./commands/budget";
import { categoryCommand } from "./commands/category";
import { configCommand } from "./commands/config";
import { historyCommand } from "./commands/history";
import { recurringCommand } from "./commands/recurring";
import { tagCommand } from "./commands/tag";
import { txCommand } from "./commands/tx";
import { undoCommand } from "./commands/undo";
import { versionCommand } from "./commands/version";
import { withGlobalOptions } from "./options";
import type { CliGlobalArgs, CliRuntime } from "./types";
import { CLI_VERSION } from "./version";

export function createCli(argv: string[], runtime: CliRuntime) {
  const stderr = runtime.stderr ?? process.stderr;
  const exit = runtime.exit ?? ((code: number) => process.exit(code));

  const cli = withGlobalOptions(yargs(argv) as Argv<CliGlobalArgs>)
    .scriptName("copilot")
    .usage("$0 <command> [options]")
    .help()
    .alias("h", "help")
    .version(CLI_VERSION)
    .alias("v", "version")
    .strict()
    .recommendCommands()
    .wrap(Math.min(120, cliTerminalWidth()))
    .middleware((args) => {
      args.runtime = runtime;
    }, false)
    .fail((msg, err, y) => {
      if (!err && msg === "Specify a command") {
        y.showHelp("log");
        exit(0);
        return;
      }
      const error = err ?? new Error(msg);
      const exitCode = exitCodeForError(error);

      runtime.logger.error({ event: "command.failed", exitCode, err: error });
      // Errors to stderr; keep stdout clean for piping.
      stderr.write(`${formatError(error)}\n`);

      // Show help for usage errors in interactive terminals.
      if (msg && process.stderr.isTTY) {
        y.showHelp("error");
      }

      exit(exitCode);
    })
    .command(txCommand)
    .command(categoryCommand)
    .command(tagCommand)
    .command(recurringCommand)
    .command(budgetCommand)
    .command(historyCommand)
    .command(undoCommand)
    .command(authCommand)
    .command(configCommand)
    .command(versionCommand)
    .demandCommand(1, "Specify a command")
    .showHelpOnFail(false);

  return cli;
}

function cliTerminalWidth(): number {
  return process.stdout.isTTY ? (process.stdout.columns ?? 120) : 120;
}
