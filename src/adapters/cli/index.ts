import { Command } from 'commander';
import { createRunCommand } from './commands/run.js';
import { createHealthCommand } from './commands/health.js';

export function createCLI(): Command {
  const program = new Command()
    .name('video-digest')
    .description('Summarize the newest matching YouTube video and post it to a Discord webhook')
    .version('1.0.0');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createHealthCommand());

  return program;
}
