/**
 * Crontab rendering for the scheduled sync
 */

export interface CronJob {
  name: string;
  schedule: string;
  command: string;
  description: string;
}

export interface CrontabOptions {
  workingDir: string;
  logsDir: string;
  jobs: CronJob[];
}

export function buildCrontab({ workingDir, logsDir, jobs }: CrontabOptions): string {
  const lines: string[] = [
    '# GitHub → Astuto issue mirror',
    '# Generated by scripts/setup-cron.ts - edit SYNC_SCHEDULE instead',
    '',
    'SHELL=/bin/bash',
    'PATH=/usr/local/bin:/usr/bin:/bin',
    '',
  ];

  for (const job of jobs) {
    const logFile = `${logsDir}/${job.name}.log`;
    lines.push(`${job.schedule} cd ${workingDir} && ${job.command} >> ${logFile} 2>&1 # ${job.description}`);
  }

  return lines.join('\n') + '\n';
}
