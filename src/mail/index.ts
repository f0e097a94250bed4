export { JsonMailStore } from './store.js';
export type { MailStore } from './store.js';
export { MailMessageSchema, MailStatus, SendMailInputSchema } from './types.js';
export type { MailMessage, SendMailInput } from './types.js';
