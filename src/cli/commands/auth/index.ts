import type { CommandModule } from "yargs";
import { z } from "zod";

import { type CopilotApi, CopilotClient } from "@/api/CopilotClient";
import type { AppContext } from "@/app/createAppContext";
import { GlobalArgsSchema, defineCommand } from "@/cli/command";
import { getOutputWriterOptions, writeNotice } from "@/cli/outputOptions";
import { promptSecret } from "@/cli/prompts";
import type { CliGlobalArgs, CliRuntime } from "@/cli/types";
import { maskSecret } from "@/config/ConfigStore";
import { type OutputFormat, type OutputWriterOptions, createOutputWriter, fieldColumn } from "@/io";

type TokenSource = "flag" | "env" | "config" | "none";

export type AuthStatus = {
  authenticated: boolean;
  source: TokenSource;
  token: string;
  baseUrl: string;
  configPath: string;
};

type StatusRow = { key: string; value: string };

const SetTokenArgsSchema = GlobalArgsSchema.extend({
  value: z.string().optional(),
  verify: z.boolean().default(true),
});

export function tokenSource(
  args: { token?: string },
  env: NodeJS.ProcessEnv,
  configToken?: string,
): TokenSource {
  if (args.token?.trim()) return "flag";
  if (env.COPILOT_TOKEN?.trim()) return "env";
  if (configToken?.trim()) return "config";
  return "none";
}

export function authStatus(ctx: AppContext, source: TokenSource): AuthStatus {
  return {
    authenticated: Boolean(ctx.token),
    source,
    token: ctx.token ? maskSecret(ctx.token) : "",
    baseUrl: ctx.baseUrl,
    configPath: ctx.configStore.path,
  };
}

export function writeAuthStatus(
  status: AuthStatus,
  format: OutputFormat,
  options?: OutputWriterOptions,
): void {
  if (format === "json") {
    createOutputWriter("json", options).write(status);
    return;
  }

  if (format === "ids") {
    createOutputWriter("ids", options).write(status.authenticated ? [status.source] : []);
    return;
  }

  const rows: StatusRow[] = [
    { key: "authenticated", value: status.authenticated ? "yes" : "no" },
    { key: "source", value: status.source },
    { key: "token", value: status.token },
    { key: "baseUrl", value: status.baseUrl },
    { key: "configPath", value: status.configPath },
  ];

  if (format === "tsv") {
    createOutputWriter("tsv", options).write(rows);
    return;
  }

  createOutputWriter("table", options).write({
    columns: [
      fieldColumn<StatusRow>("key", { header: "Key" }),
      fieldColumn<StatusRow>("value", { header: "Value" }),
    ],
    rows,
  });
}

async function readToken(value: string | undefined, runtime: CliRuntime): Promise<string> {
  const provided = value?.trim();
  if (provided) return provided;
  const prompt = runtime.promptSecret ?? promptSecret;
  const entered = (await prompt("Copilot token: ")).trim();
  if (!entered) throw new Error("Provide a non-empty token value.");
  return entered;
}

function verifierFor(ctx: AppContext & { runtime: CliRuntime }, token: string): CopilotApi {
  return ctx.runtime.copilot ?? new CopilotClient(token, { baseUrl: ctx.baseUrl });
}

export const authCommand: CommandModule<CliGlobalArgs, CliGlobalArgs> = {
  command: "auth <command>",
  describe: "Manage the Copilot token",
  builder: (y) =>
    y
      .command(
        defineCommand({
          command: "set-token [value]",
          describe: "Store a Copilot bearer token (prompts when omitted)",
          builder: (yy) =>
            yy
              .positional("value", {
                type: "string",
                describe: "Bearer token; read from a hidden prompt when omitted",
              })
              .option("verify", {
                type: "boolean",
                default: true,
                describe: "Check the token against the API before saving",
              }),
          args: SetTokenArgsSchema,
          handler: async (args, ctx) => {
            const token = await readToken(args.value, ctx.runtime);
            if (args.verify) {
              await verifierFor(ctx, token).verifyToken();
            }
            await ctx.configStore.save({ token });
            ctx.logger.info({ event: "auth.set-token", verified: args.verify });
            writeNotice(
              getOutputWriterOptions(args, ctx.runtime),
              `Token saved to ${ctx.configStore.path}.`,
            );
          },
        }),
      )
      .command(
        defineCommand({
          command: "status",
          describe: "Show where the token comes from (redacted)",
          args: GlobalArgsSchema,
          handler: (args, ctx) => {
            const env = ctx.runtime.env ?? process.env;
            const status = authStatus(ctx, tokenSource(args, env, ctx.config.token));
            writeAuthStatus(status, args.format, getOutputWriterOptions(args, ctx.runtime));
          },
        }),
      )
      .command(
        defineCommand({
          command: "logout",
          describe: "Remove the stored token",
          args: GlobalArgsSchema,
          handler: async (args, ctx) => {
            await ctx.configStore.clear(["token"]);
            ctx.logger.info({ event: "auth.logout" });
            writeNotice(getOutputWriterOptions(args, ctx.runtime), "Token removed.");
          },
        }),
      )
      .demandCommand(1, "Specify an auth subcommand")
      .strict(),
  handler: () => {},
};
