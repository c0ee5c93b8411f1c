import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryTaskRepository } from './InMemoryTaskRepository.js';
import type { Task } from '../../domain/task/entities/Task.js';

function makeTask(id: number): Task {
  return {
    id,
    title: `Task ${id}`,
    description: null,
    status: 'pending',
    priority: 'medium',
    category: 'feature',
    assignee: null,
    estimated_hours: null,
    actual_hours: null,
    tags: [],
    dependencies: [],
    created_at: '2025-03-01T09:00:00.000Z',
    updated_at: null,
    completed_at: null,
    checksum: '0000000000000000'
  };
}

describe('InMemoryTaskRepository', () => {
  let repository: InMemoryTaskRepository;

  beforeEach(() => {
    repository = new InMemoryTaskRepository();
  });

  it('hands out increasing IDs and never reuses them', () => {
    expect(repository.peekNextId()).toBe(1);
    const first = repository.nextId();
    repository.addTask(makeTask(first));
    repository.deleteTask(first);

    expect(repository.peekNextId()).toBe(2);
    expect(repository.nextId()).toBe(2);
  });

  it('refuses a duplicate ID', () => {
    expect(repository.addTask(makeTask(1))).toBe(true);
    expect(repository.addTask(makeTask(1))).toBe(false);
    expect(repository.count()).toBe(1);
  });

  it('only updates tasks it holds', () => {
    expect(repository.updateTask(3, makeTask(3))).toBe(false);
    expect(repository.hasTask(3)).toBe(false);
  });

  it('returns tasks in insertion order', () => {
    repository.addTask(makeTask(2));
    repository.addTask(makeTask(1));
    expect(repository.getAllTasks().map((task) => task.id)).toEqual([2, 1]);
  });
});
