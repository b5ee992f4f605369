import { describe, it, expect } from 'vitest';
import { renderTaskTable } from '../../src/format/task-table.js';
import type { ListedTask } from '../../src/types/task.js';

const rows: ListedTask[] = [
  {
    id: 0,
    task: { name: 'Write report', tags: ['work', 'q1'], complete: false, deadline: new Date(2025, 2, 17, 22, 0, 0) },
  },
  {
    id: 1,
    task: { name: 'Gym', tags: null, complete: false, deadline: null },
  },
];

describe('renderTaskTable', () => {
  it('sizes columns to the longest value', () => {
    expect(renderTaskTable(rows).split('\n')).toEqual([
      '| # | Name         | Tags     | Due                 | Done |',
      '='.repeat(60),
      '| 0 | Write report | work, q1 | 03/17/2025 22:00:00 |      |',
      '| 1 | Gym          |          |                     |      |',
    ]);
  });

  it('uses minimum widths for an empty listing', () => {
    expect(renderTaskTable([]).split('\n')).toEqual([
      '| # | Name | Tags | Due                 | Done |',
      '='.repeat(48),
    ]);
  });

  it('widens the id column for multi-digit ids', () => {
    const many: ListedTask[] = [{ id: 12, task: { name: 'Late', tags: null, complete: false, deadline: null } }];
    expect(renderTaskTable(many).split('\n')[2]).toBe('| 12 | Late |      |                     |      |');
  });

  it('centres the completion mark', () => {
    const done: ListedTask[] = [{ id: null, task: { name: 'Done', tags: null, complete: true, deadline: null } }];
    expect(renderTaskTable(done, { showIds: false }).split('\n')[2])
      .toBe('| Done |      |                     |  ✓   |');
  });

  it('passes each data row through styleRow', () => {
    const styled = renderTaskTable(rows, { styleRow: (line, row) => `${row.task.name}>${line.length}` });
    expect(styled.split('\n').slice(2)).toEqual(['Write report>60', 'Gym>60']);
  });
});
