import { describe, it, expect, vi, beforeAll, afterAll, afterEach } from 'vitest';
import chalk from 'chalk';
import type { ListedTask } from '@plaintask/core';
import { styleTaskRow, printResult } from '../src/output.js';

const now = new Date('2025-03-18T12:00:00Z');

function row(complete: boolean, deadline: Date | null): ListedTask {
  return { id: 0, task: { name: 'x', tags: null, complete, deadline } };
}

describe('styleTaskRow', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 1;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  it('leaves pending rows plain', () => {
    expect(styleTaskRow('| row |', row(false, new Date('2025-03-19T00:00:00Z')), now)).toBe('| row |');
  });

  it('colors overdue rows red', () => {
    expect(styleTaskRow('| row |', row(false, new Date('2025-03-17T00:00:00Z')), now))
      .toBe('\u001b[31m| row |\u001b[39m');
  });

  it('strikes completed rows through in green', () => {
    expect(styleTaskRow('| row |', row(true, null), now))
      .toBe('\u001b[32m\u001b[9m| row |\u001b[29m\u001b[39m');
  });
});

describe('printResult', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints both success and no-change results to stdout', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'success', message: 'done' });
    printResult({ type: 'no-change', message: 'nothing to do' });
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy.mock.calls[1]?.[0]).toBe('nothing to do');
  });

  it('colours only success results', () => {
    const previousLevel = chalk.level;
    chalk.level = 1;
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    printResult({ type: 'success', message: 'done' });
    printResult({ type: 'no-change', message: 'nothing to do' });
    chalk.level = previousLevel;
    expect(logSpy.mock.calls[0]?.[0]).toBe('\u001b[32mdone\u001b[39m');
    expect(logSpy.mock.calls[1]?.[0]).toBe('nothing to do');
  });
});
