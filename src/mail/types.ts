import { z } from 'zod';

export const MailStatus = z.enum(['unread', 'read']);
export type MailStatus = z.infer<typeof MailStatus>;

export const MailMessageSchema = z.object({
  id: z.number().int().positive(),
  sender: z.string(),
  receiver: z.string(),
  subject: z.string(),
  body: z.string(),
  status: MailStatus,
  timestamp: z.string().datetime(),
});

export type MailMessage = z.infer<typeof MailMessageSchema>;

export const SendMailInputSchema = z.object({
  sender: z.string().min(1),
  receiver: z.string().min(1),
  subject: z.string().min(1),
  body: z.string(),
});

export type SendMailInput = z.infer<typeof SendMailInputSchema>;
