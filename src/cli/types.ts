import type { Logger } from "pino";

import type { CopilotApi } from "@/api/CopilotClient";
import type { ConfigStore } from "@/config/ConfigStore";
import type { EntityGateway } from "@/domain/gateway";
import type { OutputFormatOption } from "./options";

/** Process-level collaborators, injectable for tests. */
export type CliRuntime = {
  logger: Logger;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
  configStore?: ConfigStore;
  journalPath?: string;
  copilot?: CopilotApi;
  gateway?: EntityGateway;
  interactive?: boolean;
  confirm?: (question: string) => Promise<boolean>;
  promptSecret?: (prompt: string) => Promise<string>;
  setExitCode?: (code: number) => void;
  exit?: (code: number) => void;
};

export type CliGlobalArgs = {
  format: OutputFormatOption;
  quiet: boolean;
  color: boolean;
  dryRun: boolean;
  yes: boolean;
  token?: string;
  baseUrl?: string;
  runtime?: CliRuntime;
};
