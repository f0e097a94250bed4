/**
 * Dashboard API server.
 * A JSON facade over the task store and the dispatch flows, plus static
 * files from `<work_dir>/ui` when present.
 */
import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import { readFile, stat } from 'node:fs/promises';
import { extname, join, normalize, sep } from 'node:path';
import { z } from 'zod';
import type { CrewContext } from '../context.js';
import { CrewctlError, TaskNotFoundError, errorMessage } from '../errors.js';
import {
  AgentNameSchema,
  PromptNameSchema,
  TaskExistsError,
  TaskIdSchema,
  TaskStatusConflictError,
  addTask,
  deleteTask,
  done,
  listAgentFiles,
  nudge,
  readAgentLog,
  sling,
  taskHistory,
} from '../tasks/index.js';
import { loadPrompt } from '../workers/index.js';
import { attachWebSocket } from './ws.js';

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.js': 'application/javascript',
  '.css': 'text/css',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

const MAX_BODY_BYTES = 1024 * 1024;

const PROMPT_NOT_FOUND = 'Prompt not found.';

const AddTaskRequest = z.object({ id: z.string(), title: z.string() });

const StartRequest = z.object({
  task_id: z.string(),
  agent_name: z.string(),
  engine: z.string().optional(),
  role: z.string().optional(),
});

const NudgeRequest = z.object({ agent_name: z.string().min(1), message: z.string().min(1) });

class HttpError extends CrewctlError {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

function json(res: ServerResponse, data: unknown, status = 200): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

function success(res: ServerResponse, data: Record<string, unknown> = {}): void {
  json(res, { status: 'success', ...data });
}

function failure(res: ServerResponse, status: number, message: string): void {
  json(res, { status: 'error', message }, status);
}

async function readBody<S extends z.ZodTypeAny>(req: IncomingMessage, schema: S): Promise<z.output<S>> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, 'Request body too large');
    chunks.push(buf);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  } catch {
    throw new HttpError(400, 'Request body must be JSON');
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new HttpError(400, `${issue.path.join('.') || 'body'}: ${issue.message}`);
  }
  return result.data;
}

async function serveStatic(res: ServerResponse, staticDir: string, urlPath: string): Promise<boolean> {
  let filePath = normalize(join(staticDir, urlPath === '/' ? 'index.html' : urlPath));
  if (filePath !== staticDir && !filePath.startsWith(staticDir + sep)) return false;
  try {
    const s = await stat(filePath);
    if (s.isDirectory()) filePath = join(filePath, 'index.html');
    const content = await readFile(filePath);
    res.writeHead(200, { 'Content-Type': MIME_TYPES[extname(filePath)] || 'application/octet-stream' });
    res.end(content);
    return true;
  } catch {
    return false;
  }
}

function decodeSegments(path: string): string[] {
  try {
    return path.split('/').filter(Boolean).map(decodeURIComponent);
  } catch {
    throw new HttpError(400, 'Malformed URL');
  }
}

function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof TaskNotFoundError) return 404;
  if (err instanceof TaskExistsError || err instanceof TaskStatusConflictError) return 409;
  if (err instanceof z.ZodError) return 400;
  return 500;
}

async function dashboardData(ctx: CrewContext) {
  const tasks = await ctx.tasks.list();
  const recent = await ctx.auditStore.query({ limit: 20 });
  const agents = tasks
    .filter((t) => t.status === 'in_progress' && t.assignee)
    .map((t) => t.assignee);
  return {
    tasks,
    agents,
    recent_logs: recent.map((e) => ({
      timestamp: e.timestamp,
      actor: e.actor,
      action: e.action,
      target: e.target,
    })),
    stats: {
      tasks_total: tasks.length,
      tasks_done: tasks.filter((t) => t.status === 'closed').length,
      tasks_open: tasks.filter((t) => t.status === 'open').length,
      tasks_in_progress: tasks.filter((t) => t.status === 'in_progress').length,
      total_cost: await ctx.costs.total(),
    },
  };
}

export interface DashboardOptions {
  /** Defaults to `<work_dir>/ui`. */
  staticDir?: string;
  /** Push task and audit changes over WebSocket. */
  websocket?: boolean;
}

export function createDashboardServer(ctx: CrewContext, opts: DashboardOptions = {}): Server {
  const staticDir = normalize(opts.staticDir ?? join(ctx.paths.root, 'ui'));

  const server = createServer(async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const path = url.pathname;
    const method = req.method ?? 'GET';

    if (method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET,POST,DELETE',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    try {
      const parts = decodeSegments(path);
      const [api, resource, id, sub] = parts;

      if (api !== 'api') {
        const served = (await serveStatic(res, staticDir, path)) || (await serveStatic(res, staticDir, '/'));
        if (!served) failure(res, 404, 'Not found');
        return;
      }

      if (method === 'GET' && resource === 'health' && parts.length === 2) {
        json(res, { status: 'ok', timestamp: new Date().toISOString() });
      } else if (method === 'GET' && resource === 'dashboard' && parts.length === 2) {
        json(res, await dashboardData(ctx));
      } else if (method === 'GET' && resource === 'logs' && parts.length === 4) {
        const log = await readAgentLog(ctx, TaskIdSchema.parse(id), AgentNameSchema.parse(sub));
        if (log.content === undefined) {
          json(res, { content: `Log file not found at: ${log.path}`, path: log.path }, 404);
        } else {
          json(res, { content: log.content, path: log.path });
        }
      } else if (method === 'GET' && resource === 'prompts' && parts.length === 3) {
        const content = await loadPrompt(ctx.paths.promptsDir, PromptNameSchema.parse(id));
        json(res, { content: content ?? PROMPT_NOT_FOUND }, content === undefined ? 404 : 200);
      } else if (method === 'GET' && resource === 'agents' && sub === 'files' && parts.length === 4) {
        json(res, { files: await listAgentFiles(ctx, AgentNameSchema.parse(id)) });
      } else if (method === 'GET' && resource === 'tasks' && sub === 'history' && parts.length === 4) {
        json(res, { history: await taskHistory(ctx, TaskIdSchema.parse(id)) });
      } else if (method === 'POST' && resource === 'tasks' && parts.length === 2) {
        const body = await readBody(req, AddTaskRequest);
        const task = await addTask(ctx, body, 'web');
        success(res, { task });
      } else if (method === 'DELETE' && resource === 'tasks' && parts.length === 3) {
        const removed = await deleteTask(ctx, id, 'web');
        if (!removed) throw new TaskNotFoundError(id);
        success(res);
      } else if (method === 'POST' && resource === 'start' && parts.length === 2) {
        const body = await readBody(req, StartRequest);
        const result = await sling(ctx, {
          taskId: body.task_id,
          agent: body.agent_name,
          engine: body.engine,
          role: body.role,
          actor: 'web',
        });
        success(res, { task: result.task, session: result.spawn.session, reopened: result.reopened });
      } else if (method === 'POST' && resource === 'done' && parts.length === 3) {
        const result = await done(ctx, { taskId: id, actor: 'web' });
        success(res, { task: result.task });
      } else if (method === 'POST' && resource === 'nudge' && parts.length === 2) {
        const body = await readBody(req, NudgeRequest);
        const result = await nudge(ctx, { agent: body.agent_name, message: body.message, actor: 'web' });
        success(res, { delivery: result.delivery });
      } else {
        failure(res, 404, 'Not found');
      }
    } catch (err) {
      const message = err instanceof z.ZodError ? err.issues.map((i) => i.message).join('; ') : errorMessage(err);
      failure(res, statusFor(err), message);
    }
  });

  if (opts.websocket) {
    const hub = attachWebSocket(server, ctx);
    server.on('close', () => hub.close());
  }

  return server;
}

export async function startDashboard(ctx: CrewContext, port: number): Promise<Server> {
  const server = createDashboardServer(ctx, { websocket: true });
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '0.0.0.0', () => resolve());
  });
  console.log(`Dashboard API running on http://0.0.0.0:${port}`);
  console.log(`WebSocket available on ws://0.0.0.0:${port}`);
  return server;
}
