import { audit } from '../audit/index.js';
import type { CrewContext } from '../context.js';
import { CreateTaskInputSchema } from './types.js';
import type { CreateTaskInput, Task } from './types.js';

export async function addTask(
  ctx: CrewContext,
  input: CreateTaskInput,
  actor = 'cli',
): Promise<Task> {
  const task = await ctx.tasks.add(CreateTaskInputSchema.parse(input));
  await audit('task.add', task.id, { actor, detail: { title: task.title } });
  return task;
}

/** Remove a task row. Its worker and logs are left alone. */
export async function deleteTask(ctx: CrewContext, id: string, actor = 'cli'): Promise<boolean> {
  const removed = await ctx.tasks.remove(id);
  if (removed) await audit('task.delete', id, { actor });
  return removed;
}
