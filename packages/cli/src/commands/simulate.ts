import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as path from 'path';
import type { FormationType } from '@swarmkit/formation';
import { Logger, loadSwarmConfig, type SwarmAgent } from '@swarmkit/swarm';
import { parseCount, parseFormationType, parseNumber } from '../options.js';
import { errorMessage, formatVector, renderTable } from '../output.js';
import { runSimulation, type SimulationResult } from '../simulation.js';

interface SimulateOptions {
  config?: string;
  agents: number;
  ticks: number;
  dt: number;
  drain: number;
  formation?: FormationType;
  json?: boolean;
  verbose?: boolean;
}

export function metricsRows(result: SimulationResult): string[][] {
  const { metrics, mission } = result;

  return [
    ['Swarm state', metrics.swarmState],
    [
      'Agents',
      `${metrics.agentCount} (${metrics.connectedAgents} connected, ${metrics.lowEnergyAgents} low energy)`,
    ],
    ['Leader', result.leaderId ?? 'none'],
    ['Ticks', String(metrics.tickCount)],
    [
      'Mission',
      mission ? `${mission.state} (${Math.round(mission.completionPercentage * 100)}%)` : 'none',
    ],
    ['Centroid', formatVector(metrics.centroid)],
    ['Cohesion', metrics.cohesion.toFixed(3)],
    ['Dispersion', `${metrics.dispersion.toFixed(2)} m`],
  ];
}

export function agentRows(agents: SwarmAgent[]): string[][] {
  return agents.map(agent => [
    agent.id,
    agent.state.role,
    agent.state.energyLevel.toFixed(2),
    formatVector(agent.state.position),
  ]);
}

function simulate(options: SimulateOptions): void {
  const spinner = ora('Running simulation...').start();

  try {
    const config = options.config ? loadSwarmConfig(path.resolve(options.config)) : {};
    const result = runSimulation({
      config,
      agents: options.agents,
      ticks: options.ticks,
      dt: options.dt,
      drain: options.drain,
      formation: options.formation,
      logger: new Logger('swarmctl', options.verbose ? 'info' : 'error'),
    });

    spinner.succeed(`Simulated ${result.metrics.tickCount} ticks with ${result.added} agents`);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
      return;
    }

    console.log('\n' + renderTable(['Metric', 'Value'], metricsRows(result)));
    console.log(renderTable(['Agent', 'Role', 'Energy', 'Position'], agentRows(result.agents)));

    if (result.added < options.agents) {
      console.log(chalk.yellow(`⚠ ${options.agents - result.added} agents refused by the coordinator`));
    }
  } catch (error) {
    spinner.fail('Simulation failed');
    console.error(chalk.red(errorMessage(error)));
    process.exit(1);
  }
}

export function simulateCommand(program: Command): void {
  program
    .command('simulate')
    .description('Run a headless swarm simulation and print the resulting metrics')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-n, --agents <count>', 'Number of agents', parseCount, 4)
    .option('-t, --ticks <count>', 'Number of ticks', parseCount, 100)
    .option('--dt <seconds>', 'Tick length', parseNumber, 0.1)
    .option('--drain <energy>', 'Energy each agent loses per tick', parseNumber, 0)
    .option('-f, --formation <type>', 'Formation type', parseFormationType)
    .option('-j, --json', 'Output as JSON')
    .option('--verbose', 'Log coordinator activity')
    .action(simulate);
}
