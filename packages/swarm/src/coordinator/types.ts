/**
 * Coordinator Types
 */

import type { FormationCommand, Vector3 } from '@swarmkit/formation';
import type {
  AgentState,
  ContextRecord,
  NewTask,
  SwarmTask,
} from '../collaborators/types.js';

/**
 * Lifecycle of one mission. `paused` missions can be resumed.
 */
export type MissionState = 'planning' | 'executing' | 'paused' | 'completed' | 'failed';

/**
 * Top-level swarm state. `emergency` overrides everything else while its
 * conditions hold.
 */
export type SwarmState = 'idle' | 'planning' | 'executing' | 'completed' | 'failed' | 'emergency';

/**
 * An agent as held in the coordinator registry
 */
export interface SwarmAgent {
  id: string;
  state: AgentState;
  /** Last context snapshot; republished every tick while contextConnected */
  context: ContextRecord;
  messagingConnected: boolean;
  contextConnected: boolean;
  /** Unix ms of the last add or update */
  lastUpdate: number;
}

/**
 * Agent as submitted to addAgent/updateAgent. Fields left out take defaults
 * on add and keep their current value on update.
 */
export interface AgentInput {
  id: string;
  state?: Partial<Omit<AgentState, 'agentId'>>;
  context?: Partial<Omit<ContextRecord, 'agentId'>>;
  messagingConnected?: boolean;
  contextConnected?: boolean;
}

export interface Mission {
  id: string;
  type: string;
  description: string;
  targetLocation: Vector3;
  priority: number;
  assignedAgents: string[];
  /** Task snapshots, refreshed from the decision framework while executing */
  tasks: SwarmTask[];
  state: MissionState;
  /** Mean task completion, 0 to 1 */
  completionPercentage: number;
  startTimestamp: number;
  /** Unix ms, 0 for none */
  deadlineTimestamp: number;
  parameters: Record<string, string>;
}

export interface MissionInput {
  /** Generated when absent */
  id?: string;
  type?: string;
  description?: string;
  targetLocation?: Vector3;
  priority?: number;
  assignedAgents?: string[];
  tasks?: NewTask[];
  deadlineTimestamp?: number;
  parameters?: Record<string, string>;
}

/**
 * Formation command for one registered agent
 */
export type AgentFormationCommand = FormationCommand & {
  agentId: string;
  /** 0 is the leader slot */
  slot: number;
};

/**
 * Point-in-time swarm metrics
 */
export interface SwarmMetrics {
  swarmId: string;
  swarmState: SwarmState;
  agentCount: number;
  connectedAgents: number;
  lowEnergyAgents: number;
  missions: Record<MissionState, number>;
  tickCount: number;
  centroid: Vector3;
  cohesion: number;
  dispersion: number;
  uptimeMs: number;
  updatedAt: Date;
}

/**
 * Swarm event types
 */
export type SwarmEventType =
  | 'initialized'
  | 'started'
  | 'stopped'
  | 'reset'
  | 'agent_added'
  | 'agent_removed'
  | 'agent_updated'
  | 'agent_disconnected'
  | 'mission_created'
  | 'mission_state_changed'
  | 'mission_completed'
  | 'formation_changed'
  | 'leader_changed'
  | 'formation_updated'
  | 'emergency_entered'
  | 'emergency_cleared'
  | 'state_changed';

/**
 * Swarm event payload
 */
export interface SwarmEvent {
  type: SwarmEventType;
  timestamp: Date;
  swarmId: string;
  data: Record<string, unknown>;
}

export interface SwarmCoordinatorEvents {
  swarmEvent: (event: SwarmEvent) => void;
}
