import { createRunLogger } from "@/logging";
import { formatError } from "@/util/errors";
import { ExitCode } from "@/util/exitCodes";
import { createCli } from "./root";

/** Runs one invocation with a per-run log that records how it ended. */
export async function main(argv: string[]): Promise<void> {
  const startMs = Date.now();
  const run = createRunLogger({ argv });
  const { logger } = run;

  let ended = false;
  const end = (code: number) => {
    if (ended) return;
    ended = true;
    logger.info({ event: "run_end", code, durationMs: Date.now() - startMs });
    run.close();
  };

  process.once("exit", end);

  process.on("uncaughtException", (err) => {
    logger.fatal({ event: "uncaught_exception", err });
    process.stderr.write(`${formatError(err)}\n`);
    end(ExitCode.Failure);
    process.exit(ExitCode.Failure);
  });

  // Logged and turned into a failing exit code.
  process.on("unhandledRejection", (reason) => {
    logger.error({ event: "unhandled_rejection", err: reason });
    process.exitCode = ExitCode.Failure;
  });

  await createCli(argv, { logger }).parseAsync();
}

await main(process.argv.slice(2));
