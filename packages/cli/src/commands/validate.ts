import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import {
  ConfigLoadError,
  ConfigValidationError,
  loadSwarmConfig,
  type SwarmConfig,
} from '@swarmkit/swarm';
import { renderTable } from '../output.js';

interface ValidateOptions {
  json?: boolean;
}

export type ConfigCheck =
  | { valid: true; file: string; config: SwarmConfig }
  | { valid: false; file: string; errors: string[] };

/**
 * Load a config file and collect its problems instead of throwing
 */
export function checkConfigFile(file: string, env: NodeJS.ProcessEnv = process.env): ConfigCheck {
  try {
    return { valid: true, file, config: loadSwarmConfig(file, env) };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { valid: false, file, errors: error.issues.length > 0 ? error.issues : [error.message] };
    }
    if (error instanceof ConfigLoadError) {
      return { valid: false, file, errors: [error.message] };
    }
    throw error;
  }
}

export function configRows(config: SwarmConfig): string[][] {
  return [
    ['Swarm id', config.id ?? '(generated)'],
    ['Agents', `${config.minAgents}-${config.maxAgents}`],
    ['Update rate', `${config.updateRateHz} Hz`],
    ['Agent timeout', `${config.agentTimeoutSec} s`],
    ['Formation', `${config.formation.type} (spacing ${config.formation.spacing} m)`],
    ['Decision mode', config.decision.mode],
    ['Auto tick', config.autoTick ? 'on' : 'off'],
  ];
}

function validate(file: string, options: ValidateOptions): void {
  const spinner = ora('Validating configuration...').start();
  const result = checkConfigFile(path.resolve(file));

  if (!result.valid) {
    spinner.fail('Configuration is invalid');
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      result.errors.forEach(e => console.error(chalk.red(`  • ${e}`)));
    }
    process.exit(1);
  }

  spinner.succeed('Configuration is valid');

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log('\n' + renderTable(['Setting', 'Value'], configRows(result.config)));
  }
}

export function validateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate a swarm configuration file')
    .argument('<file>', 'YAML configuration file')
    .option('-j, --json', 'Output as JSON')
    .action(validate);
}
