import { describe, it, expect } from 'vitest';
import { compareTasks, priorityRank, sortTasks } from './sort.js';
import { createTask } from '../task/task.js';
import type { Task } from '../task/types.js';

function task(id: number, priority: string, dueDate: string | null = null): Task {
  return createTask({ id, title: `Task ${id}`, priority, dueDate, createdAt: '2025-01-01T00:00:00.000Z' });
}

describe('priorityRank', () => {
  it('должен ранжировать high < medium < low', () => {
    expect(priorityRank('high')).toBe(0);
    expect(priorityRank('medium')).toBe(1);
    expect(priorityRank('low')).toBe(2);
  });

  it('должен ставить неизвестный приоритет последним', () => {
    expect(priorityRank('urgent')).toBe(3);
    expect(priorityRank('toString')).toBe(3);
  });
});

describe('compareTasks', () => {
  it('должен сравнивать сроки для одинакового приоритета', () => {
    expect(compareTasks(task(1, 'high', '2025-01-10'), task(2, 'high', '2025-02-01'))).toBeLessThan(0);
    expect(compareTasks(task(1, 'high', '2025-02-01'), task(2, 'high', '2025-01-10'))).toBeGreaterThan(0);
  });

  it('должен возвращать 0 для равных ключей', () => {
    expect(compareTasks(task(1, 'low'), task(2, 'low'))).toBe(0);
  });
});

describe('sortTasks', () => {
  it('должен сортировать по приоритету', () => {
    const result = sortTasks([task(1, 'low'), task(2, 'urgent'), task(3, 'high'), task(4, 'medium')]);

    expect(result.map((t) => t.id)).toEqual([3, 4, 1, 2]);
  });

  it('должен ставить задачи без срока после задач со сроком', () => {
    const result = sortTasks([
      task(1, 'medium'),
      task(2, 'medium', '2025-05-01'),
      task(3, 'medium', '2025-01-15'),
    ]);

    expect(result.map((t) => t.id)).toEqual([3, 2, 1]);
  });

  it('должен сохранять исходный порядок для равных ключей', () => {
    const result = sortTasks([
      task(5, 'high', '2025-01-01'),
      task(2, 'high', '2025-01-01'),
      task(9, 'high', '2025-01-01'),
    ]);

    expect(result.map((t) => t.id)).toEqual([5, 2, 9]);
  });

  it('не должен мутировать входной массив', () => {
    const input = [task(1, 'low'), task(2, 'high')];
    const originalOrder = [...input];

    const result = sortTasks(input);

    expect(input).toEqual(originalOrder);
    expect(result).not.toBe(input);
  });

  it('должен обрабатывать пустой массив', () => {
    expect(sortTasks([])).toEqual([]);
  });
});
