import { join } from 'node:path';
import { z } from 'zod';
import { CrewctlError } from '../errors.js';
import { readJsonFile, writeJsonFile } from '../json-file.js';
import { TaskSchema } from './types.js';
import type {
  CreateTaskInput,
  Task,
  TaskPatch,
  TaskStatus,
  UpdateOptions,
  UpdateResult,
} from './types.js';

const TasksFileSchema = z.array(TaskSchema);

export const TASKS_FILE = 'tasks.json';

export interface TaskStore {
  add(input: CreateTaskInput): Promise<Task>;
  get(id: string): Promise<Task | undefined>;
  list(filter?: { status?: TaskStatus; assignee?: string }): Promise<Task[]>;
  update(id: string, patch: TaskPatch, opts?: UpdateOptions): Promise<UpdateResult>;
  remove(id: string): Promise<boolean>;
}

export class TaskExistsError extends CrewctlError {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} already exists.`);
  }
}

/**
 * Tasks in a single JSON file. Every call is one read or one
 * read-modify-write; concurrent writers race and the last one wins.
 */
export class JsonTaskStore implements TaskStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, TASKS_FILE);
  }

  private async readAll(): Promise<Task[]> {
    return readJsonFile(this.filePath, TasksFileSchema, []);
  }

  private async writeAll(tasks: Task[]): Promise<void> {
    await writeJsonFile(this.filePath, tasks);
  }

  async add(input: CreateTaskInput): Promise<Task> {
    const tasks = await this.readAll();
    if (tasks.some((t) => t.id === input.id)) throw new TaskExistsError(input.id);
    const now = new Date().toISOString();
    const task = TaskSchema.parse({
      id: input.id,
      title: input.title,
      status: 'open',
      createdAt: now,
      updatedAt: now,
    });
    tasks.push(task);
    await this.writeAll(tasks);
    return task;
  }

  async get(id: string): Promise<Task | undefined> {
    const tasks = await this.readAll();
    return tasks.find((t) => t.id === id);
  }

  async list(filter?: { status?: TaskStatus; assignee?: string }): Promise<Task[]> {
    let tasks = await this.readAll();
    if (filter?.status) tasks = tasks.filter((t) => t.status === filter.status);
    if (filter?.assignee) tasks = tasks.filter((t) => t.assignee === filter.assignee);
    return tasks;
  }

  async update(id: string, patch: TaskPatch, opts: UpdateOptions = {}): Promise<UpdateResult> {
    const tasks = await this.readAll();
    const index = tasks.findIndex((t) => t.id === id);
    if (index === -1) return { applied: false, reason: 'not_found' };
    const previous = tasks[index];
    if (opts.expectedStatus && previous.status !== opts.expectedStatus) {
      return { applied: false, reason: 'status_mismatch', task: previous };
    }
    const task = TaskSchema.parse({ ...previous, ...patch, updatedAt: new Date().toISOString() });
    tasks[index] = task;
    await this.writeAll(tasks);
    return { applied: true, task, previous };
  }

  async remove(id: string): Promise<boolean> {
    const tasks = await this.readAll();
    const index = tasks.findIndex((t) => t.id === id);
    if (index === -1) return false;
    tasks.splice(index, 1);
    await this.writeAll(tasks);
    return true;
  }
}

/** Mark a task closed, keeping its assignee. Returns undefined when the task does not exist. */
export async function closeTask(
  store: TaskStore,
  id: string,
): Promise<{ task: Task; changed: boolean } | undefined> {
  const current = await store.get(id);
  if (!current) return undefined;
  if (current.status === 'closed') return { task: current, changed: false };
  const result = await store.update(id, { status: 'closed', closedAt: new Date().toISOString() });
  if (!result.applied) return undefined;
  return { task: result.task, changed: true };
}
