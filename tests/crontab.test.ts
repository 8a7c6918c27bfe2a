import { describe, it, expect } from 'vitest';
import { buildCrontab } from '../src/utils/crontab';

describe('buildCrontab', () => {
  it('should render one line per job with its log file', () => {
    const crontab = buildCrontab({
      workingDir: '/srv/mirror',
      logsDir: '/srv/mirror/logs',
      jobs: [
        {
          name: 'astuto-sync',
          schedule: '*/30 * * * *',
          command: 'node dist/scripts/cron-astuto-sync.js',
          description: 'Mirror GitHub issues to Astuto',
        },
      ],
    });

    expect(crontab).toBe(
      [
        '# GitHub → Astuto issue mirror',
        '# Generated by scripts/setup-cron.ts - edit SYNC_SCHEDULE instead',
        '',
        'SHELL=/bin/bash',
        'PATH=/usr/local/bin:/usr/bin:/bin',
        '',
        '*/30 * * * * cd /srv/mirror && node dist/scripts/cron-astuto-sync.js >> /srv/mirror/logs/astuto-sync.log 2>&1 # Mirror GitHub issues to Astuto',
        '',
      ].join('\n')
    );
  });

  it('should render only the header without jobs', () => {
    expect(buildCrontab({ workingDir: '/srv', logsDir: '/srv/logs', jobs: [] }).split('\n')).toHaveLength(7);
  });
});
