/**
 * Coordinator Module Exports
 */

export { SwarmCoordinator, createSwarm } from './SwarmCoordinator.js';
export type {
  MissionState,
  SwarmState,
  SwarmAgent,
  AgentInput,
  Mission,
  MissionInput,
  AgentFormationCommand,
  SwarmMetrics,
  SwarmEventType,
  SwarmEvent,
  SwarmCoordinatorEvents,
} from './types.js';
