import { describe, it, expect } from 'vitest';
import { resolveTaskFilePath, DEFAULT_TASK_FILE } from '../src/config.js';

describe('resolveTaskFilePath', () => {
  it('prefers an explicit path', () => {
    expect(resolveTaskFilePath('/tmp/tasks.txt', { PLAINTASK_FILE: '/tmp/env.txt' })).toBe('/tmp/tasks.txt');
  });

  it('falls back to PLAINTASK_FILE', () => {
    expect(resolveTaskFilePath(undefined, { PLAINTASK_FILE: '/tmp/env.txt' })).toBe('/tmp/env.txt');
  });

  it('ignores blank values', () => {
    expect(resolveTaskFilePath('  ', { PLAINTASK_FILE: '' })).toBe(DEFAULT_TASK_FILE);
  });

  it('defaults to ./database', () => {
    expect(resolveTaskFilePath(undefined, {})).toBe('./database');
  });
});
