import type { Argv, CommandModule } from "yargs";
import { z } from "zod";

import type { CopilotApi } from "@/api/CopilotClient";
import { type AppContext, createAppContext } from "@/app/createAppContext";
import type { EntityGateway } from "@/domain/gateway";
import { OUTPUT_FORMATS } from "@/io";
import type { JournalStore } from "@/journal/JournalStore";
import type { CliGlobalArgs, CliRuntime } from "./types";

export type CommandRequirements = {
  /** Needs a token and a Copilot client. */
  auth?: boolean;
  /** Needs the local journal. */
  journal?: boolean;
};

export type CommandContext = AppContext & { runtime: CliRuntime };

/** Global flags every handler sees; command schemas extend this. */
export const GlobalArgsSchema = z.object({
  format: z.enum(OUTPUT_FORMATS).default("table"),
  quiet: z.boolean().default(false),
  color: z.boolean().default(true),
  dryRun: z.boolean().default(false),
  yes: z.boolean().default(false),
  token: z.string().optional(),
  baseUrl: z.string().optional(),
});

export type GlobalArgs = z.infer<typeof GlobalArgsSchema>;

export function requireCopilot(ctx: AppContext): CopilotApi {
  if (!ctx.copilot) throw new Error("Copilot client is not available.");
  return ctx.copilot;
}

export function requireGateway(ctx: AppContext): EntityGateway {
  if (!ctx.gateway) throw new Error("Copilot gateway is not available.");
  return ctx.gateway;
}

export function requireJournal(ctx: AppContext): JournalStore {
  if (!ctx.journal) throw new Error("Journal is not available.");
  return ctx.journal;
}

function formatArgIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function defineCommand<S extends z.ZodType<GlobalArgs, z.ZodTypeDef, unknown>>(spec: {
  command: string;
  describe?: string;
  requirements?: CommandRequirements;
  builder?: (y: Argv<CliGlobalArgs>) => Argv<CliGlobalArgs>;
  args: S;
  handler: (args: z.output<S>, ctx: CommandContext) => void | Promise<void>;
}): CommandModule<CliGlobalArgs, CliGlobalArgs> {
  const requirements = spec.requirements ?? {};

  return {
    command: spec.command,
    describe: spec.describe,
    builder: spec.builder,
    handler: async (argv) => {
      const runtime = argv.runtime;
      if (!runtime) {
        throw new Error("Command runtime is not available.");
      }
      const parsed = spec.args.safeParse(argv);
      if (!parsed.success) {
        throw new Error(`Invalid arguments: ${formatArgIssues(parsed.error)}`);
      }

      const ctx = await createAppContext({
        argv: { token: argv.token, baseUrl: argv.baseUrl },
        env: runtime.env,
        configStore: runtime.configStore,
        journalPath: runtime.journalPath,
        openJournal: Boolean(requirements.journal),
        requireToken: Boolean(requirements.auth),
        copilot: runtime.copilot,
        gateway: runtime.gateway,
        logger: runtime.logger,
      });
      try {
        await spec.handler(parsed.data, { ...ctx, runtime });
      } finally {
        ctx.db?.close();
      }
    },
  };
}
