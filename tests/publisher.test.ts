import { describe, it, expect } from 'vitest';
import {
  PostPublisher,
  buildMarkerIndex,
  classifyDestinationError,
  extractSourceUrl,
  formatPostDescription,
  markerFor,
} from '../src/services/publisher';
import { InMemoryBoard, httpError, makeRecord, networkError, recordingSleep } from './fakes';

const retryPolicy = { maxAttempts: 3, baseDelayMs: 100, backoff: 'exponential' as const };

function setup() {
  const board = new InMemoryBoard();
  const { delays, sleep } = recordingSleep();
  const publisher = new PostPublisher(board, { boardId: 7, retryPolicy, sleep });
  return { board, delays, publisher };
}

describe('markers', () => {
  it('should build the marker line from the issue URL', () => {
    expect(markerFor(makeRecord(1))).toBe('Originally reported at: https://github.com/acme/widgets/issues/1');
  });

  it('should read the marker from the footer line', () => {
    const description = 'Steps to reproduce\n\n---\nOriginally reported at: https://github.com/acme/widgets/issues/4/\n';
    expect(extractSourceUrl(description)).toBe('https://github.com/acme/widgets/issues/4');
  });

  it('should read the footer written by the first importer', () => {
    const description = [
      '',
      '                It crashes',
      '',
      '',
      '                ---',
      '',
      '                Originally from GitHub Issue #3',
      '',
      '                Status: open',
      '',
      '                Original URL: https://github.com/Acme/Widgets/issues/3',
      '            ',
    ].join('\n');

    expect(extractSourceUrl(description)).toBe('https://github.com/acme/widgets/issues/3');
  });

  it('should ignore marker lines quoted above the footer', () => {
    const description = [
      'Same as the other one:',
      'Originally reported at: https://github.com/acme/widgets/issues/5',
      'Original URL: https://github.com/acme/widgets/issues/6',
      '',
      '---',
      'GitHub issue #7 (open), opened 2024-03-01',
      'Originally reported at: https://github.com/acme/widgets/issues/7',
    ].join('\n');

    expect(extractSourceUrl(description)).toBe('https://github.com/acme/widgets/issues/7');
    expect(extractSourceUrl('Originally reported at: https://github.com/acme/widgets/issues/5\nthanks')).toBeUndefined();
  });

  it('should return nothing for an empty description', () => {
    expect(extractSourceUrl(null)).toBeUndefined();
    expect(extractSourceUrl('')).toBeUndefined();
    expect(extractSourceUrl('\n  \n')).toBeUndefined();
  });

  it('should index the markers of every post', () => {
    const index = buildMarkerIndex([
      { id: 1, title: 'A', description: formatPostDescription(makeRecord(1)) },
      { id: 2, title: 'B', description: 'no marker here' },
      { id: 3, title: 'C', description: null },
    ]);
    expect([...index]).toEqual(['https://github.com/acme/widgets/issues/1']);
  });
});

describe('formatPostDescription', () => {
  it('should append the footer and marker to the issue body', () => {
    const issue = makeRecord(1, { body: 'It crashes on start\n' });
    expect(formatPostDescription(issue)).toBe(
      [
        'It crashes on start',
        '',
        '---',
        'GitHub issue #1 (open), opened 2024-03-01',
        'Originally reported at: https://github.com/acme/widgets/issues/1',
      ].join('\n')
    );
  });

  it('should fill in an empty body', () => {
    const issue = makeRecord(2, { body: '  ', state: 'closed' });
    expect(formatPostDescription(issue).split('\n').slice(0, 4)).toEqual([
      'No description provided.',
      '',
      '---',
      'GitHub issue #2 (closed), opened 2024-03-01',
    ]);
  });
});

describe('classifyDestinationError', () => {
  it('should map HTTP statuses to error kinds', () => {
    expect(classifyDestinationError(httpError(401, {})).kind).toBe('DestinationAuthError');
    expect(classifyDestinationError(httpError(403, {})).kind).toBe('DestinationAuthError');
    expect(classifyDestinationError(httpError(422, {})).kind).toBe('DestinationValidationError');
    expect(classifyDestinationError(httpError(500, {})).kind).toBe('DestinationValidationError');
    expect(classifyDestinationError(httpError(503, {})).kind).toBe('TransientNetworkError');
    expect(classifyDestinationError(httpError(429, {})).kind).toBe('TransientNetworkError');
    expect(classifyDestinationError(networkError()).kind).toBe('TransientNetworkError');
  });

  it('should keep the Retry-After delay of a throttled request', () => {
    const throttled = classifyDestinationError(httpError(429, { error: 'Slow down' }, { 'retry-after': '2' }));
    expect(throttled).toMatchObject({
      kind: 'TransientNetworkError',
      httpStatus: 429,
      retryAfterMs: 2000,
      message: 'Astuto temporarily unavailable (HTTP 429): Slow down',
    });
  });

  it('should use the message from the response body', () => {
    expect(classifyDestinationError(httpError(422, { errors: ['Title is too short', 'Board missing'] })).message).toBe(
      'Astuto rejected the post (HTTP 422): Title is too short, Board missing'
    );
    expect(classifyDestinationError(httpError(401, { error: 'Invalid API key' })).message).toBe(
      'Astuto rejected the API key (HTTP 401): Invalid API key'
    );
  });
});

describe('PostPublisher.publish', () => {
  it('should skip an issue whose marker is already on the board', async () => {
    const { board, publisher } = setup();
    const existing = buildMarkerIndex([
      { id: 10, title: 'Old', description: `Imported\n\n${markerFor(makeRecord(42))}` },
    ]);

    const result = await publisher.publish(makeRecord(42), existing);

    expect(result).toEqual({ status: 'skipped', sourceId: 42 });
    expect(board.createCalls).toEqual([]);
  });

  it('should create a post carrying the back-link marker', async () => {
    const { board, publisher } = setup();
    const issue = makeRecord(1, { title: 'Bug A' });

    const result = await publisher.publish(issue, new Set());

    expect(result).toEqual({ status: 'created', sourceId: 1, postId: 1, attempts: 1 });
    expect(board.createCalls).toEqual([
      { title: 'Bug A', description: formatPostDescription(issue), boardId: 7 },
    ]);
  });

  it('should fail without retrying when the API key is rejected', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [httpError(401, { error: 'Invalid API key' })]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toEqual({
      status: 'failed',
      sourceId: 1,
      kind: 'DestinationAuthError',
      reason: 'Astuto rejected the API key (HTTP 401): Invalid API key',
      httpStatus: 401,
      attempts: 1,
    });
    expect(board.createCalls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('should fail without retrying when the post is rejected', async () => {
    const { board, publisher } = setup();
    board.failures.set('Issue 1', [httpError(422, { error: 'Title is too short' })]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toMatchObject({ status: 'failed', kind: 'DestinationValidationError', httpStatus: 422 });
    expect(board.createCalls).toHaveLength(1);
  });

  it('should retry network failures and recover', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [networkError(), httpError(503, 'Service Unavailable')]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toEqual({ status: 'created', sourceId: 1, postId: 1, attempts: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it('should give up on network failures after the last attempt', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [networkError(), networkError(), networkError()]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toEqual({
      status: 'failed',
      sourceId: 1,
      kind: 'TransientNetworkError',
      reason: 'Astuto unreachable: connect ECONNREFUSED 127.0.0.1:3000',
      httpStatus: undefined,
      attempts: 3,
    });
    expect(board.createCalls).toHaveLength(3);
    expect(delays).toEqual([100, 200]);
  });

  it('should retry a timed out request', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [networkError('timeout of 1000ms exceeded', 'ECONNABORTED')]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toEqual({ status: 'created', sourceId: 1, postId: 1, attempts: 2 });
    expect(delays).toEqual([100]);
  });

  it('should wait as long as a throttling response asks before retrying', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [httpError(429, { error: 'Too many requests' }, { 'retry-after': '2' })]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toEqual({ status: 'created', sourceId: 1, postId: 1, attempts: 2 });
    expect(delays).toEqual([2000]);
  });

  it('should back off on a throttling response without Retry-After', async () => {
    const { board, delays, publisher } = setup();
    board.failures.set('Issue 1', [httpError(429, {}), httpError(429, {})]);

    const result = await publisher.publish(makeRecord(1), new Set());

    expect(result).toMatchObject({ status: 'created', attempts: 3 });
    expect(delays).toEqual([100, 200]);
  });

  it('should send the Astuto status mapped from the issue state', async () => {
    const board = new InMemoryBoard();
    const publisher = new PostPublisher(board, { boardId: 7, statuses: { open: 'under_review', closed: 'closed' } });

    await publisher.publish(makeRecord(1), new Set());
    await publisher.publish(makeRecord(2, { state: 'closed' }), new Set());

    expect(board.createCalls.map(call => call.status)).toEqual(['under_review', 'closed']);
  });

  it('should send no status for an unmapped state', async () => {
    const { board, publisher } = setup();

    await publisher.publish(makeRecord(1), new Set());

    expect(board.createCalls[0]?.status).toBeUndefined();
  });
});
