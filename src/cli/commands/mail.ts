import { Command } from 'commander';
import chalk from 'chalk';
import { audit } from '../../audit/index.js';
import { contextFor, reportError } from '../context.js';

export function createMailCommand(): Command {
  const mail = new Command('mail').description('Agent inboxes');

  mail
    .command('inbox')
    .description('List messages, newest first')
    .option('--to <agent>', 'Only messages for this receiver')
    .action(async (opts: { to?: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const messages = await ctx.mail.inbox(opts.to);
        if (messages.length === 0) {
          console.log('Inbox is empty.');
          return;
        }
        for (const m of messages) {
          const marker = m.status === 'unread' ? chalk.yellow('●') : ' ';
          console.log(`${marker} [${m.id}] To: ${m.receiver} | From: ${m.sender} | Subject: ${m.subject}`);
        }
      } catch (err) {
        reportError(err);
      }
    });

  mail
    .command('send')
    .description('Send a message to an agent')
    .argument('<receiver>', 'Agent name')
    .requiredOption('-s, --subject <subject>', 'Subject')
    .requiredOption('-b, --body <body>', 'Body')
    .action(async (receiver: string, opts: { subject: string; body: string }, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const message = await ctx.mail.send({ sender: 'user', receiver, subject: opts.subject, body: opts.body });
        await audit('mail.send', receiver, { detail: { id: message.id } });
        console.log(chalk.green(`Mail sent to ${receiver}.`));
      } catch (err) {
        reportError(err);
      }
    });

  mail
    .command('read')
    .description('Show a message and mark it read')
    .argument('<id>', 'Message ID')
    .action(async (id: string, _opts: unknown, cmd: Command) => {
      try {
        const ctx = await contextFor(cmd);
        const message = await ctx.mail.read(parseInt(id, 10));
        if (!message) {
          console.error('Message not found.');
          process.exitCode = 1;
          return;
        }
        console.log(`From: ${message.sender}`);
        console.log(`To: ${message.receiver}`);
        console.log(`Subject: ${chalk.bold(message.subject)}`);
        console.log(chalk.dim(message.timestamp));
        console.log(`\n${message.body}`);
      } catch (err) {
        reportError(err);
      }
    });

  return mail;
}
