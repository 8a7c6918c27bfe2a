/**
 * Cron Job Setup Script
 * Installs the crontab entry that runs the GitHub → Astuto sync
 */

import { config } from 'dotenv';
config();

import { execSync } from 'child_process';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../src/utils/config';
import { buildCrontab, type CronJob } from '../src/utils/crontab';
import { ConfigError } from '../src/utils/errors';
import { logger } from '../src/utils/logger';

function setupCronJobs(): void {
  try {
    const { schedule } = loadConfig();
    const workingDir = process.cwd();
    const logsDir = process.env.LOG_DIR || join(workingDir, 'logs');

    const jobs: CronJob[] = [
      {
        name: 'astuto-sync',
        schedule,
        command: 'node dist/scripts/cron-astuto-sync.js',
        description: 'Mirror GitHub issues to Astuto',
      },
    ];

    if (!existsSync(logsDir)) {
      mkdirSync(logsDir, { recursive: true });
    }

    const crontabPath = join(workingDir, 'astuto-sync-crontab');
    writeFileSync(crontabPath, buildCrontab({ workingDir, logsDir, jobs }));

    for (const job of jobs) {
      logger.info('Added cron job', { name: job.name, schedule: job.schedule, description: job.description });
    }

    // Install crontab
    try {
      execSync(`crontab ${crontabPath}`, { stdio: 'inherit' });
      logger.info('Crontab installed successfully', { crontabPath });
    } catch (error) {
      logger.error('Failed to install crontab', { error });
      logger.info('Install manually with: crontab ' + crontabPath);
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', { issues: error.issues });
    } else {
      logger.error('Cron setup failed', { error });
    }
    process.exitCode = 1;
  }
}

// Run if called directly
if (require.main === module) {
  setupCronJobs();
}

export { setupCronJobs };
