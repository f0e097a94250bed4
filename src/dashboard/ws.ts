import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'node:http';
import type { CrewContext } from '../context.js';
import { errorMessage } from '../errors.js';

export type Channel = 'tasks' | 'audit';

interface WsClient {
  ws: WebSocket;
  subscriptions: Set<string>;
}

export interface WebSocketHub {
  close(): void;
}

const POLL_INTERVAL_MS = 3000;

/**
 * Push task and audit changes to dashboard clients. The store has no change
 * feed, so the hub polls it and broadcasts when a snapshot differs.
 */
export function attachWebSocket(server: HttpServer, ctx: CrewContext): WebSocketHub {
  const wss = new WebSocketServer({ server });
  const clients: WsClient[] = [];
  let lastTaskHash = '';
  let lastAuditHash = '';
  let timer: NodeJS.Timeout | undefined;

  const broadcast = (channel: Channel, data: unknown): void => {
    const msg = JSON.stringify({ type: 'update', channel, data, ts: Date.now() });
    for (const client of clients) {
      if (client.ws.readyState === WebSocket.OPEN && client.subscriptions.has(channel)) {
        client.ws.send(msg);
      }
    }
  };

  const snapshot = async () => {
    const tasks = await ctx.tasks.list();
    const audit = await ctx.auditStore.query({ limit: 10 });
    return {
      tasks,
      audit,
      taskHash: JSON.stringify(tasks.map((t) => [t.id, t.status, t.assignee, t.updatedAt])),
      auditHash: JSON.stringify(audit.map((a) => a.id)),
    };
  };

  const poll = async (): Promise<void> => {
    try {
      const snap = await snapshot();
      if (snap.taskHash !== lastTaskHash) {
        lastTaskHash = snap.taskHash;
        broadcast('tasks', { tasks: snap.tasks });
      }
      if (snap.auditHash !== lastAuditHash) {
        lastAuditHash = snap.auditHash;
        broadcast('audit', { audit: snap.audit });
      }
    } catch (err) {
      console.error(`[ws] poll error: ${errorMessage(err)}`);
    }
  };

  const sendInitState = async (ws: WebSocket): Promise<void> => {
    try {
      const snap = await snapshot();
      // Prevent a duplicate broadcast on the next poll
      lastTaskHash = snap.taskHash;
      lastAuditHash = snap.auditHash;
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(JSON.stringify({ type: 'init', data: { tasks: snap.tasks, audit: snap.audit }, ts: Date.now() }));
      }
    } catch (err) {
      console.error(`[ws] sendInitState error: ${errorMessage(err)}`);
    }
  };

  wss.on('connection', (ws) => {
    const client: WsClient = { ws, subscriptions: new Set<string>(['tasks', 'audit']) };
    clients.push(client);

    ws.on('message', (raw) => {
      let msg: unknown;
      try {
        msg = JSON.parse(String(raw));
      } catch {
        return;
      }
      if (typeof msg !== 'object' || msg === null) return;
      const type = 'type' in msg ? msg.type : undefined;
      const channel = 'channel' in msg ? msg.channel : undefined;
      if (type === 'subscribe' && typeof channel === 'string') {
        client.subscriptions.add(channel);
      } else if (type === 'unsubscribe' && typeof channel === 'string') {
        client.subscriptions.delete(channel);
      } else if (type === 'ping') {
        ws.send(JSON.stringify({ type: 'pong' }));
      }
    });

    ws.on('error', (err) => {
      console.error(`[ws] client error: ${errorMessage(err)}`);
    });

    ws.on('close', () => {
      const idx = clients.indexOf(client);
      if (idx !== -1) clients.splice(idx, 1);
    });

    void sendInitState(ws);

    if (!timer) {
      timer = setInterval(() => void poll(), POLL_INTERVAL_MS);
    }
  });

  return {
    close() {
      if (timer) clearInterval(timer);
      timer = undefined;
      for (const client of clients) client.ws.terminate();
      clients.length = 0;
      wss.close();
    },
  };
}
