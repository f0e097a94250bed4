#!/usr/bin/env node

import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createTaskCommand } from './commands/tasks.js';
import { createWorkerCommand } from './commands/worker.js';
import { createDoneCommand, createNudgeCommand, createSlingCommand } from './commands/dispatch.js';
import { createPeekCommand, createTrailCommand } from './commands/inspect.js';
import { createMonitorCommand } from './commands/monitor.js';
import { createMailCommand } from './commands/mail.js';
import { createDashboardCommand } from './commands/dashboard.js';
import { createConfigCommand } from './commands/config.js';
import { createAdminCommand } from './commands/admin.js';
import { createCostsCommand } from './commands/costs.js';
import { createStatusCommand } from './commands/status.js';

const program = new Command('crewctl')
  .description('Run agent workers in tmux sessions and track their tasks to completion')
  .version('0.1.0')
  .option('--dir <path>', 'Work dir holding .crewctl/, .logs/, workers/ and prompts/ (default: cwd)');

program.addCommand(createInitCommand());
program.addCommand(createTaskCommand());
program.addCommand(createWorkerCommand());
program.addCommand(createSlingCommand());
program.addCommand(createDoneCommand());
program.addCommand(createNudgeCommand());
program.addCommand(createPeekCommand());
program.addCommand(createTrailCommand());
program.addCommand(createMonitorCommand());
program.addCommand(createMailCommand());
program.addCommand(createDashboardCommand());
program.addCommand(createConfigCommand());
program.addCommand(createAdminCommand());
program.addCommand(createCostsCommand());
program.addCommand(createStatusCommand());

await program.parseAsync();
