// Lightweight dependency injection container for CLI
// Only opens the database and reads policy.json, no Telegram client
// Uses singleton pattern to reuse container across commands

import type { ResidencyStore } from '../core/ports';
import { loadPolicyConfig } from '../infra/config/loadPolicy';
import type { PolicyConfig } from '../infra/config/policySchema';
import { openDatabase } from '../infra/db/database';
import { loadDatabaseEnv } from '../infra/env';
import { SqliteResidencyStore } from '../infra/services/sqliteResidencyStore';

// Container shape for CLI commands
export interface CliContainer {
  databasePath: string;
  policy: PolicyConfig;
  store: ResidencyStore;
  disconnect: () => Promise<void>;
}

// Cached container instance (singleton pattern)
let container: CliContainer | null = null;

// Get or create CLI container
// Bot token and admin id are not needed here, only DATABASE_PATH
export async function getCliContainer(): Promise<CliContainer> {
  if (container) {
    return container;
  }

  const { DATABASE_PATH } = loadDatabaseEnv();
  const policy = loadPolicyConfig();
  const db = openDatabase(DATABASE_PATH);
  const store: ResidencyStore = new SqliteResidencyStore(db);

  // disconnect function closes database and resets singleton
  const disconnect = async (): Promise<void> => {
    db.close();
    container = null;
  };

  container = { databasePath: DATABASE_PATH, policy, store, disconnect };
  return container;
}
