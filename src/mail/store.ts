import { join } from 'node:path';
import { z } from 'zod';
import { readJsonFile, writeJsonFile } from '../json-file.js';
import { MailMessageSchema, SendMailInputSchema } from './types.js';
import type { MailMessage, SendMailInput } from './types.js';

const MailFileSchema = z.array(MailMessageSchema);

export interface MailStore {
  send(input: SendMailInput): Promise<MailMessage>;
  /** Newest first; all receivers unless one is given. */
  inbox(receiver?: string): Promise<MailMessage[]>;
  /** Returns the message and marks it read. */
  read(id: number): Promise<MailMessage | undefined>;
}

export class JsonMailStore implements MailStore {
  private readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = join(stateDir, 'mail.json');
  }

  private async readAll(): Promise<MailMessage[]> {
    return readJsonFile(this.filePath, MailFileSchema, []);
  }

  private async writeAll(messages: MailMessage[]): Promise<void> {
    await writeJsonFile(this.filePath, messages);
  }

  async send(input: SendMailInput): Promise<MailMessage> {
    const parsed = SendMailInputSchema.parse(input);
    const messages = await this.readAll();
    const message: MailMessage = {
      ...parsed,
      id: messages.reduce((max, m) => Math.max(max, m.id), 0) + 1,
      status: 'unread',
      timestamp: new Date().toISOString(),
    };
    messages.push(message);
    await this.writeAll(messages);
    return message;
  }

  async inbox(receiver?: string): Promise<MailMessage[]> {
    const messages = await this.readAll();
    return messages.filter((m) => !receiver || m.receiver === receiver).reverse();
  }

  async read(id: number): Promise<MailMessage | undefined> {
    const messages = await this.readAll();
    const index = messages.findIndex((m) => m.id === id);
    if (index === -1) return undefined;
    if (messages[index].status === 'unread') {
      messages[index] = { ...messages[index], status: 'read' };
      await this.writeAll(messages);
    }
    return messages[index];
  }
}
