import { describe, it, expect } from 'vitest';
import { describeError, formatMessage } from '../logger';

const PREFIX = /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] /;

describe('formatMessage', () => {
  it('prefixes timestamp and level', () => {
    const line = formatMessage('INFO', 'Lap 3 completed');
    expect(line).toMatch(PREFIX);
    expect(line.replace(PREFIX, '')).toBe('[INFO] Lap 3 completed');
  });

  it('appends structured data as JSON', () => {
    const line = formatMessage('WARN', 'Logging suspended', { lap: 3, reason: 'idle_timeout' });
    expect(line.replace(PREFIX, '')).toBe('[WARN] Logging suspended {"lap":3,"reason":"idle_timeout"}');
  });

  it('appends primitives as text', () => {
    expect(formatMessage('DEBUG', 'Samples', 42).replace(PREFIX, '')).toBe('[DEBUG] Samples 42');
  });

  it('appends the stack of an error', () => {
    const error = new Error('shared memory closed');
    const line = formatMessage('ERROR', 'Read failed', error);
    expect(line.replace(PREFIX, '')).toBe(`[ERROR] Read failed ${error.stack ?? ''}`);
  });
});

describe('describeError', () => {
  it('uses the message of errors and the text of anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});
