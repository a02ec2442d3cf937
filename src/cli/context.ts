import { ensureDirectories, getConfig, getDatabasePath, reloadConfig } from '../config/config.js';
import { CrmError, ValidationError } from '../domain/errors.js';
import { createServices, type CrmServices } from '../services/index.js';
import { CrmDatabase } from '../store/database.js';
import type { Config } from '../types/index.js';

export interface CommonOptions {
  config?: string;
}

/**
 * Load configuration, open the database and wire the services for one
 * command run. The caller closes `services.db` when done.
 */
export function openServices(options: CommonOptions): { config: Config; services: CrmServices } {
  let config: Config;
  if (options.config) {
    const loaded = reloadConfig(options.config);
    if (!loaded.success) {
      throw loaded.error;
    }
    config = loaded.data;
  } else {
    config = getConfig();
  }

  const dirs = ensureDirectories(config);
  if (!dirs.success) {
    throw dirs.error;
  }

  const db = new CrmDatabase(getDatabasePath(config));
  db.open();
  return { config, services: createServices(db, config) };
}

export function describeCliError(error: unknown): string {
  if (error instanceof ValidationError && error.issues.length > 0) {
    const lines = error.issues.map((issue) => `  ${issue.path || '(root)'}: ${issue.message}`);
    return `${error.message}\n${lines.join('\n')}`;
  }
  if (error instanceof CrmError) {
    return `${error.message} (${error.code})`;
  }
  return error instanceof Error ? error.message : String(error);
}
