import { Command } from 'commander';
import chalk from 'chalk';
import { formationCommand } from './commands/formation.js';
import { simulateCommand } from './commands/simulate.js';
import { validateCommand } from './commands/validate.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('swarmctl')
    .description('Swarm coordination toolkit - validate configurations, preview formations and run simulations')
    .version('0.1.0', '-v, --version');

  // Register commands
  validateCommand(program);
  formationCommand(program);
  simulateCommand(program);

  // Global error handler
  program.on('command:*', () => {
    console.error(
      chalk.red(
        `\nInvalid command: ${program.args.join(' ')}\nSee --help for a list of available commands.\n`
      )
    );
    process.exit(1);
  });

  return program;
}
