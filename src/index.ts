import { Command } from 'commander';
import { runCommand } from './commands/run/index.js';
import { statusCommand } from './commands/status/index.js';
import { resetCommand } from './commands/reset/index.js';
import { initCommand } from './commands/init/index.js';
import { apisCommand } from './commands/apis/index.js';

const program = new Command();

program
  .name('provision')
  .description('Checkpointed, resumable GCP environment provisioning')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(statusCommand);
program.addCommand(resetCommand);
program.addCommand(initCommand);
program.addCommand(apisCommand);

program.parse();
