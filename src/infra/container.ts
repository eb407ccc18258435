import type { Database as DatabaseType } from 'better-sqlite3';
import { ResidentBot } from '../adapters/telegram/ResidentBot';
import { SerialQueue } from '../adapters/telegram/SerialQueue';
import { TelegramClient } from '../adapters/telegram/TelegramClient';
import { HouseResolver } from '../core/application/HouseResolver';
import { Notifier } from '../core/application/Notifier';
import { ReportService } from '../core/application/ReportService';
import { ApprovalOrchestrator } from '../core/application/orchestrator/ApprovalOrchestrator';
import { RegistrationFlow } from '../core/application/orchestrator/RegistrationFlow';
import { CandidateSessionStore } from '../core/application/sessions/CandidateSessionStore';
import type { ChatTransport, Config, Logger, ResidencyStore } from '../core/ports';
import { loadPolicyConfig } from './config/loadPolicy';
import { openDatabase } from './db/database';
import { loadEnv } from './env';
import { logger } from './logger';
import { ConfigImpl } from './services/Config';
import { SqliteResidencyStore } from './services/sqliteResidencyStore';
import { TelegramService } from './services/TelegramService';

export interface AppContainer {
  botName: string;
  databasePath: string;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export interface WorkflowDeps {
  store: ResidencyStore;
  transport: ChatTransport;
  config: Config;
  logger: Logger;
  sessions?: CandidateSessionStore;
}

export interface Workflows {
  sessions: CandidateSessionStore;
  notifier: Notifier;
  resolver: HouseResolver;
  registration: RegistrationFlow;
  orchestrator: ApprovalOrchestrator;
  reports: ReportService;
}

// Wire the platform-independent services; tests call this with fakes
export function buildWorkflows(deps: WorkflowDeps): Workflows {
  const sessions = deps.sessions ?? new CandidateSessionStore();
  const notifier = new Notifier(deps.transport, deps.config, deps.logger);
  const resolver = new HouseResolver(deps.store, sessions, notifier, deps.logger);
  const registration = new RegistrationFlow(deps.store, sessions, notifier, deps.config, deps.logger);
  const orchestrator = new ApprovalOrchestrator(
    deps.store,
    sessions,
    resolver,
    registration,
    notifier,
    deps.transport,
    deps.config,
    deps.logger,
  );
  const reports = new ReportService(deps.store, deps.config);

  return { sessions, notifier, resolver, registration, orchestrator, reports };
}

// Throws on invalid environment or policy.json; main() treats that as fatal
export async function buildApp(): Promise<AppContainer> {
  const env = loadEnv();
  const policy = loadPolicyConfig();
  const config = new ConfigImpl(policy, { adminId: env.ADMIN_ID, botName: env.BOT_NAME });

  const db: DatabaseType = openDatabase(env.DATABASE_PATH);
  const telegram = new TelegramClient(env.BOT_TOKEN);

  const workflows = buildWorkflows({
    store: new SqliteResidencyStore(db),
    transport: new TelegramService(telegram.sdk.telegram),
    config,
    logger,
  });

  const bot = new ResidentBot(
    telegram,
    new SerialQueue(),
    workflows.orchestrator,
    workflows.reports,
    workflows.notifier,
    config,
  );
  bot.bind();

  const start = async (): Promise<void> => {
    await telegram.start();
  };

  const stop = async (): Promise<void> => {
    try {
      telegram.shutdown('shutdown');
    } finally {
      db.close();
    }
  };

  return { botName: env.BOT_NAME, databasePath: env.DATABASE_PATH, start, stop };
}
