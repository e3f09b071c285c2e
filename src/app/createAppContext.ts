import type { Logger } from "pino";

import { type CopilotApi, type RequestTraceEvent, CopilotClient, DEFAULT_BASE_URL } from "@/api/CopilotClient";
import { CopilotEntityGateway } from "@/api/gateway";
import { ConfigStore } from "@/config/ConfigStore";
import { getJournalPath } from "@/config/paths";
import type { Config } from "@/config/schema";
import type { EntityGateway } from "@/domain/gateway";
import { type JournalDb, openJournalDb } from "@/journal/db";
import { JournalStore } from "@/journal/JournalStore";
import { MissingTokenError } from "./errors";

export type AppContext = {
  configStore: ConfigStore;
  config: Config;
  logger: Logger;
  baseUrl: string;
  token?: string;
  db?: JournalDb;
  journal?: JournalStore;
  copilot?: CopilotApi;
  gateway?: EntityGateway;
};

export type AppContextOptions = {
  argv?: {
    token?: string;
    "base-url"?: string;
    baseUrl?: string;
  };
  env?: NodeJS.ProcessEnv;
  configStore?: ConfigStore;
  journalPath?: string;
  openJournal?: boolean;
  requireToken?: boolean;
  copilot?: CopilotApi;
  gateway?: EntityGateway;
  logger: Logger;
};

function normalize(value?: string | null): string | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

export function resolveJournalPath(
  config: Config,
  env: NodeJS.ProcessEnv = process.env,
  override?: string,
): string {
  return (
    normalize(override) ??
    normalize(env.COPILOT_JOURNAL_PATH) ??
    normalize(config.journalPath) ??
    getJournalPath()
  );
}

export async function createAppContext(options: AppContextOptions): Promise<AppContext> {
  if (!options.logger) {
    throw new Error("createAppContext requires a logger.");
  }
  const logger = options.logger;
  const env = options.env ?? process.env;
  const configStore = options.configStore ?? new ConfigStore();
  const config = await configStore.load();

  const token =
    normalize(options.argv?.token) ?? normalize(env.COPILOT_TOKEN) ?? normalize(config.token);
  const baseUrl =
    normalize(options.argv?.["base-url"] ?? options.argv?.baseUrl) ??
    normalize(env.COPILOT_BASE_URL) ??
    normalize(config.baseUrl) ??
    DEFAULT_BASE_URL;

  const requireToken = options.requireToken ?? true;
  if (requireToken && !token && !options.copilot) {
    throw new MissingTokenError();
  }

  const trace = (event: RequestTraceEvent) => {
    const payload = {
      event: "copilot.request",
      name: event.name,
      phase: event.phase,
      requestId: event.requestId,
      startTime: event.startTime,
      durationMs: event.durationMs,
      meta: event.meta,
      summary: event.summary,
      status: event.status,
    };

    if (event.phase === "error") {
      logger.error({ ...payload, err: event.error });
      return;
    }

    logger.debug(payload);
  };

  const copilot =
    options.copilot ?? (token ? new CopilotClient(token, { baseUrl, trace }) : undefined);
  const gateway = options.gateway ?? (copilot ? new CopilotEntityGateway(copilot) : undefined);

  let db: JournalDb | undefined;
  let journal: JournalStore | undefined;
  let journalPath: string | undefined;
  if (options.openJournal) {
    journalPath = resolveJournalPath(config, env, options.journalPath);
    db = await openJournalDb(journalPath);
    journal = new JournalStore(db);
  }

  logger.info({
    event: "context",
    hasToken: Boolean(token),
    baseUrl,
    journalPath,
  });

  return { configStore, config, logger, baseUrl, token, db, journal, copilot, gateway };
}
