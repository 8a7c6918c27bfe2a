/**
 * GitHub → Astuto Sync Cron Job
 * Mirrors GitHub issues onto the Astuto board, one run per invocation
 */

import { config } from 'dotenv';
config();

import { runSync } from '../src/services';
import type { SyncConfig } from '../src/types';
import { loadConfig } from '../src/utils/config';
import { ConfigError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

/**
 * Resolves with the process exit code: 0 when the run got through every
 * issue (even with per-issue failures), 1 otherwise.
 */
async function syncGitHubIssuesToAstuto(): Promise<number> {
  let syncConfig: SyncConfig;
  try {
    syncConfig = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { issues: error.issues });
      return 1;
    }
    throw error;
  }

  const summary = await runSync(syncConfig);
  return summary.finalState === 'done' ? 0 : 1;
}

// Run if called directly
if (require.main === module) {
  syncGitHubIssuesToAstuto()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      logger.error('GitHub → Astuto sync crashed', { error });
      process.exitCode = 1;
    });
}

export { syncGitHubIssuesToAstuto };
