import { PRIORITY_RANK } from '../entities/Task.js';
import type { Task } from '../entities/Task.js';
import { listTasksQuerySchema, parseOrThrow } from '../../../application/schemas/taskSchemas.js';
import type { ListTasksInput, ListTasksQuery, SortField } from '../../../application/schemas/taskSchemas.js';
import type { TaskSnapshotSource } from '../ports.js';

type SortValue = number | string;

/**
 * Sort key for a task. Null timestamps sort as the minimum.
 */
function sortValue(task: Task, field: SortField): SortValue {
  switch (field) {
    case 'priority':
      return PRIORITY_RANK[task.priority];
    case 'status':
      return task.status;
    case 'created_at':
      return task.created_at;
    case 'updated_at':
      return task.updated_at ?? '';
  }
}

function compareValues(a: SortValue, b: SortValue): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Split a comma-separated tag filter, dropping blanks
 */
export function parseTagFilter(tags: string): string[] {
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

export function filterTasks(tasks: Task[], query: ListTasksQuery): Task[] {
  const tagFilter = query.tags === undefined ? [] : parseTagFilter(query.tags);

  return tasks.filter((task) => {
    if (query.status && task.status !== query.status) return false;
    if (query.priority && task.priority !== query.priority) return false;
    if (query.category && task.category !== query.category) return false;
    if (query.assignee && task.assignee !== query.assignee) return false;
    if (tagFilter.length > 0 && !tagFilter.some((tag) => task.tags.includes(tag))) return false;
    return true;
  });
}

/**
 * Stable sort in either direction: equal keys keep their input order,
 * descending included.
 */
export function sortTasks(tasks: Task[], field: SortField, order: 'asc' | 'desc'): Task[] {
  const direction = order === 'desc' ? -1 : 1;
  return tasks
    .map((task, index) => ({ task, index, key: sortValue(task, field) }))
    .sort((a, b) => compareValues(a.key, b.key) * direction || a.index - b.index)
    .map(({ task }) => task);
}

/**
 * Task Query Service
 * Filter, sort and paginate a snapshot of the store
 */
export class TaskQueryService {
  constructor(private tasks: TaskSnapshotSource) {}

  listTasks(input: ListTasksInput = {}): Task[] {
    const query = parseOrThrow(listTasksQuerySchema, input, 'task query');

    const filtered = filterTasks(this.tasks.getAllTasks(), query);
    const sorted = sortTasks(filtered, query.sort_by, query.order);

    return sorted.slice(query.offset, query.offset + query.limit);
  }
}
