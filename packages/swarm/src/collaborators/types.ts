/**
 * Collaborator Types
 *
 * Narrow interfaces the coordinator consumes for decision making, agent
 * messaging and shared context. The coordinator only holds these abstract
 * references, so any implementation can be substituted.
 */

import type { Quaternion, Vector3 } from '@swarmkit/formation';
import type {
  ContextConfig,
  DecisionConfig,
  MessagingConfig,
} from '../config/schema.js';

/**
 * Role an agent plays in the swarm
 */
export type AgentRole =
  | 'leader'
  | 'scout'
  | 'worker'
  | 'guardian'
  | 'relay'
  | 'specialist'
  | 'adaptive';

/**
 * Collective behavior an agent takes part in
 */
export type BehaviorType =
  | 'exploration'
  | 'exploitation'
  | 'formation'
  | 'dispersion'
  | 'aggregation'
  | 'migration'
  | 'defense'
  | 'search'
  | 'rescue';

/**
 * Authoritative per-agent state held by the decision framework
 */
export interface AgentState {
  agentId: string;
  role: AgentRole;
  position: Vector3;
  velocity: Vector3;
  orientation: Quaternion;
  /** 0 (depleted) to 1 (full) */
  energyLevel: number;
  /** Capability name to proficiency */
  capabilities: Record<string, number>;
  assignedTasks: string[];
  behavior: BehaviorType;
  /** Unix ms */
  timestamp: number;
}

export type TaskStatus = 'pending' | 'assigned' | 'in_progress' | 'completed' | 'failed';

export interface SwarmTask {
  id: string;
  description: string;
  location: Vector3;
  priority: number;
  estimatedDurationSec: number;
  requiredCapabilities: string[];
  assignedAgents: string[];
  status: TaskStatus;
  /** 0 to 1 */
  completionPercentage: number;
  /** Unix ms, 0 for none */
  deadlineTimestamp: number;
}

/**
 * Task as submitted; the id is generated when absent
 */
export type NewTask = Partial<SwarmTask>;

export interface EmergentBehavior {
  id: string;
  type: BehaviorType;
  triggeringAgents: string[];
  /** 0 to 1 */
  strength: number;
  startTimestamp: number;
}

export type MessageType =
  | 'proposal'
  | 'accept'
  | 'reject'
  | 'request'
  | 'response'
  | 'broadcast'
  | 'heartbeat'
  | 'emergency';

export type MessagePriority = 'low' | 'medium' | 'high' | 'critical';

export interface SwarmMessage {
  id: string;
  senderId: string;
  /** Absent for broadcasts */
  receiverId?: string;
  type: MessageType;
  content: string;
  data: Record<string, string>;
  priority: MessagePriority;
  timestamp: number;
  ttlSec: number;
}

/**
 * Shared situational context published by one agent
 */
export interface ContextRecord {
  agentId: string;
  position: Vector3;
  velocity: Vector3;
  orientation: Quaternion;
  missionState: string;
  perception: Record<string, string>;
  planning: Record<string, string>;
  execution: Record<string, string>;
  timestamp: number;
}

/**
 * Capabilities every collaborator shares
 */
export interface Lifecycle {
  start(): void;
  stop(): void;
  /** Clear all held state; the running flag is unchanged */
  reset(): void;
  isRunning(): boolean;
}

export interface DecisionFramework extends Lifecycle {
  registerAgent(state: AgentState): boolean;
  unregisterAgent(agentId: string): boolean;
  updateAgentState(state: AgentState): boolean;
  getAgentState(agentId: string): AgentState | undefined;
  getAllAgents(): AgentState[];

  /** Returns the task id, or undefined when refused or the id is taken */
  createTask(task: NewTask): string | undefined;
  getTask(taskId: string): SwarmTask | undefined;
  updateTaskProgress(taskId: string, fraction: number): boolean;
  completeTask(taskId: string): boolean;

  computeSwarmCentroid(): Vector3;
  computeSwarmCohesion(): number;
  computeSwarmDispersion(): number;
  detectEmergentBehaviors(): EmergentBehavior[];
  assessSwarmCapabilities(): Record<string, number>;

  /** Periodic processing, driven by the coordinator tick */
  update(deltaTime: number): void;
  getConfig(): DecisionConfig;
  configure(config: Partial<DecisionConfig>): void;
}

export interface MessagingBus extends Lifecycle {
  registerAgent(agentId: string, capabilities: Record<string, number>): boolean;
  unregisterAgent(agentId: string): boolean;
  sendBroadcast(message: SwarmMessage): boolean;
  sendMessage(message: SwarmMessage): boolean;
  /** Drains the inbox */
  receiveMessages(): SwarmMessage[];
}

export interface ContextDirectory extends Lifecycle {
  publishContext(record: ContextRecord): boolean;
  /**
   * Latest record of every agent, or the full history of one agent
   */
  queryContext(agentId?: string): ContextRecord[];
}

export interface Collaborators {
  decision: DecisionFramework;
  messaging: MessagingBus;
  context: ContextDirectory;
}

export interface CollaboratorConfig {
  decision: DecisionConfig;
  messaging: MessagingConfig;
  context: ContextConfig;
}

/**
 * Builds the collaborators for one coordinator configuration
 */
export interface CollaboratorFactory {
  create(config: CollaboratorConfig): Collaborators;
}
