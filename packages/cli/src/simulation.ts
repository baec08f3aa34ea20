/**
 * Headless swarm simulation
 *
 * Agents start on a line along y with the first one as formation leader.
 * Every tick the followers integrate the velocity of their formation command
 * while the leader holds its pose, every agent loses `drain` energy, and the
 * single mission task advances linearly so that it completes on the last
 * tick.
 */

import { add, scale, vec3, type FormationType } from '@swarmkit/formation';
import {
  SwarmCoordinator,
  type Logger,
  type Mission,
  type SwarmAgent,
  type SwarmConfigInput,
  type SwarmEventType,
  type SwarmMetrics,
} from '@swarmkit/swarm';

export const SIMULATION_MISSION_ID = 'simulation';
export const SIMULATION_TASK_ID = 'simulation-task';

export interface SimulationOptions {
  config?: SwarmConfigInput;
  agents: number;
  ticks: number;
  /** [s] */
  dt: number;
  /** Energy each agent loses per tick */
  drain: number;
  formation?: FormationType;
  /** [m] Distance between agents on the starting line */
  lineSpacing?: number;
  logger?: Logger;
}

export interface SimulationResult {
  /** Agents the coordinator accepted */
  added: number;
  leaderId?: string;
  mission?: Mission;
  /** Taken after the last tick, before the swarm is stopped */
  metrics: SwarmMetrics;
  agents: SwarmAgent[];
  /** Number of coordinator events by type */
  events: Partial<Record<SwarmEventType, number>>;
}

export function runSimulation(options: SimulationOptions): SimulationResult {
  const coordinator = new SwarmCoordinator(
    { ...options.config, autoTick: false },
    undefined,
    options.logger
  );

  const events: Partial<Record<SwarmEventType, number>> = {};
  coordinator.on('swarmEvent', event => {
    events[event.type] = (events[event.type] ?? 0) + 1;
  });

  coordinator.initialize();
  if (options.formation) {
    coordinator.setFormation(options.formation);
  }
  coordinator.start();

  const ids = addAgentsOnLine(coordinator, options.agents, options.lineSpacing ?? 2);
  const leaderId = ids.at(0);
  if (leaderId !== undefined) {
    coordinator.setFormationLeader(leaderId);
  }

  coordinator.createMission({
    id: SIMULATION_MISSION_ID,
    type: 'formation',
    description: 'Hold formation',
    tasks: [{ id: SIMULATION_TASK_ID, description: 'Reach formation slots' }],
  });
  coordinator.startMission(SIMULATION_MISSION_ID);

  for (let tick = 1; tick <= options.ticks; tick++) {
    step(coordinator, options, leaderId);
    coordinator.updateTaskProgress(SIMULATION_TASK_ID, tick / options.ticks);
    coordinator.update(options.dt);
  }

  const result: SimulationResult = {
    added: ids.length,
    leaderId,
    mission: coordinator.getMission(SIMULATION_MISSION_ID),
    metrics: coordinator.getMetrics(),
    agents: coordinator.getAllAgents(),
    events,
  };

  coordinator.stop();
  return result;
}

function addAgentsOnLine(coordinator: SwarmCoordinator, count: number, spacing: number): string[] {
  // Zero-padded so id order matches creation order
  const width = String(Math.max(count - 1, 0)).length;
  const ids: string[] = [];

  for (let i = 0; i < count; i++) {
    const id = `agent-${String(i).padStart(width, '0')}`;
    if (coordinator.addAgent({ id, state: { position: vec3(0, i * spacing, 0) } })) {
      ids.push(id);
    }
  }

  return ids;
}

function step(
  coordinator: SwarmCoordinator,
  options: SimulationOptions,
  leaderId: string | undefined
): void {
  const commands = new Map(coordinator.getFormationCommands().map(c => [c.agentId, c]));

  for (const agent of coordinator.getAllAgents()) {
    const command = agent.id === leaderId ? undefined : commands.get(agent.id);
    const velocity = command ? command.desiredVelocity : vec3();

    coordinator.updateAgent({
      id: agent.id,
      state: {
        position: add(agent.state.position, scale(velocity, options.dt)),
        velocity,
        orientation: command ? command.desiredOrientation : agent.state.orientation,
        energyLevel: agent.state.energyLevel - options.drain,
      },
    });
  }
}
