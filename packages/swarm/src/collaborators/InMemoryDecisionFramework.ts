/**
 * In-Memory Decision Framework
 *
 * Tracks agent state and tasks in process and derives collective metrics:
 * - Swarm centroid, cohesion and dispersion
 * - Emergent behavior detection (aggregation, formation)
 * - Energy-ranked role assignment
 */

import { v4 as uuidv4 } from 'uuid';
import { distance, mean, vec3, type Vector3 } from '@swarmkit/formation';
import { DecisionConfigSchema, type DecisionConfig } from '../config/schema.js';
import { ConfigValidationError } from '../config/errors.js';
import type {
  AgentRole,
  AgentState,
  DecisionFramework,
  EmergentBehavior,
  NewTask,
  SwarmTask,
} from './types.js';

/** Behaviors are only detected in swarms at least this large */
const MIN_BEHAVIOR_AGENTS = 3;
/** [m] RMS spread below which the swarm counts as aggregated */
const AGGREGATION_DISPERSION = 10;
const FORMATION_COHESION = 0.7;

export class InMemoryDecisionFramework implements DecisionFramework {
  private config: DecisionConfig;
  private running = false;
  private agents: Map<string, AgentState> = new Map();
  private tasks: Map<string, SwarmTask> = new Map();
  private activeBehaviors: EmergentBehavior[] = [];

  constructor(config: Partial<DecisionConfig> = {}) {
    this.config = parseDecisionConfig(config);
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  reset(): void {
    this.agents.clear();
    this.tasks.clear();
    this.activeBehaviors = [];
  }

  isRunning(): boolean {
    return this.running;
  }

  getConfig(): DecisionConfig {
    return { ...this.config };
  }

  configure(config: Partial<DecisionConfig>): void {
    this.config = parseDecisionConfig({ ...this.config, ...config });
  }

  // Agents

  registerAgent(state: AgentState): boolean {
    if (!this.running || state.agentId === '') {
      return false;
    }
    if (!this.agents.has(state.agentId) && this.agents.size >= this.config.maxAgents) {
      return false;
    }

    this.agents.set(state.agentId, structuredClone(state));
    return true;
  }

  unregisterAgent(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  updateAgentState(state: AgentState): boolean {
    if (!this.agents.has(state.agentId)) {
      return false;
    }
    this.agents.set(state.agentId, structuredClone(state));
    return true;
  }

  getAgentState(agentId: string): AgentState | undefined {
    const state = this.agents.get(agentId);
    return state ? structuredClone(state) : undefined;
  }

  getAllAgents(): AgentState[] {
    return Array.from(this.agents.values(), state => structuredClone(state));
  }

  // Tasks

  createTask(task: NewTask): string | undefined {
    if (!this.running) {
      return undefined;
    }

    const id = task.id || `task-${uuidv4()}`;
    if (this.tasks.has(id)) {
      return undefined;
    }

    this.tasks.set(id, {
      id,
      description: task.description ?? '',
      location: task.location ? { ...task.location } : vec3(),
      priority: task.priority ?? 0.5,
      estimatedDurationSec: task.estimatedDurationSec ?? 0,
      requiredCapabilities: [...(task.requiredCapabilities ?? [])],
      assignedAgents: [...(task.assignedAgents ?? [])],
      status: task.status ?? 'pending',
      completionPercentage: clampFraction(task.completionPercentage ?? 0),
      deadlineTimestamp: task.deadlineTimestamp ?? 0,
    });

    return id;
  }

  getTask(taskId: string): SwarmTask | undefined {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  updateTaskProgress(taskId: string, fraction: number): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      return false;
    }

    task.completionPercentage = clampFraction(fraction);
    task.status = task.completionPercentage >= 1 ? 'completed' : 'in_progress';
    return true;
  }

  completeTask(taskId: string): boolean {
    return this.updateTaskProgress(taskId, 1);
  }

  // Collective metrics

  computeSwarmCentroid(): Vector3 {
    return mean(Array.from(this.agents.values(), agent => agent.position));
  }

  /**
   * 1 / (1 + 0.1 * mean distance to the centroid); 0 below two agents
   */
  computeSwarmCohesion(): number {
    const distances = this.distancesToCentroid();
    if (distances.length < 2) {
      return 0;
    }

    const avgDistance = distances.reduce((sum, d) => sum + d, 0) / distances.length;
    return 1 / (1 + avgDistance * 0.1);
  }

  /**
   * RMS distance to the centroid; 0 below two agents
   */
  computeSwarmDispersion(): number {
    const distances = this.distancesToCentroid();
    if (distances.length < 2) {
      return 0;
    }

    const sumSquared = distances.reduce((sum, d) => sum + d * d, 0);
    return Math.sqrt(sumSquared / distances.length);
  }

  detectEmergentBehaviors(): EmergentBehavior[] {
    if (this.agents.size < MIN_BEHAVIOR_AGENTS) {
      return [];
    }

    const detected: EmergentBehavior[] = [];
    const triggeringAgents = Array.from(this.agents.keys()).sort();
    const now = Date.now();

    const dispersion = this.computeSwarmDispersion();
    if (dispersion < AGGREGATION_DISPERSION) {
      detected.push({
        id: `aggregation-${uuidv4()}`,
        type: 'aggregation',
        triggeringAgents,
        strength: 1 - dispersion / AGGREGATION_DISPERSION,
        startTimestamp: now,
      });
    }

    const cohesion = this.computeSwarmCohesion();
    if (cohesion > FORMATION_COHESION) {
      detected.push({
        id: `formation-${uuidv4()}`,
        type: 'formation',
        triggeringAgents: [...triggeringAgents],
        strength: cohesion,
        startTimestamp: now,
      });
    }

    return detected;
  }

  /**
   * Behaviors recorded by the most recent update()
   */
  getActiveBehaviors(): EmergentBehavior[] {
    return structuredClone(this.activeBehaviors);
  }

  /**
   * Sum of each capability over all agents
   */
  assessSwarmCapabilities(): Record<string, number> {
    const totals: Record<string, number> = {};

    for (const agent of this.agents.values()) {
      for (const [name, value] of Object.entries(agent.capabilities)) {
        totals[name] = (totals[name] ?? 0) + value;
      }
    }

    return totals;
  }

  update(_deltaTime: number): void {
    if (!this.running) {
      return;
    }

    if (this.config.enableDynamicRoles) {
      this.reassignRoles();
    }

    this.activeBehaviors = this.config.enableEmergentBehavior
      ? this.detectEmergentBehaviors()
      : [];
  }

  /**
   * Rank agents by energy: one leader per ten agents (at least one), then
   * 20% scouts, 10% guardians, 10% relays; everyone else works.
   */
  private reassignRoles(): void {
    const count = this.agents.size;
    if (count === 0) {
      return;
    }

    const quotas: Array<[AgentRole, number]> = [
      ['leader', Math.max(1, Math.floor(count / 10))],
      ['scout', Math.floor(count / 5)],
      ['guardian', Math.floor(count / 10)],
      ['relay', Math.floor(count / 10)],
    ];

    const ranked = Array.from(this.agents.values()).sort(
      (a, b) => b.energyLevel - a.energyLevel || a.agentId.localeCompare(b.agentId)
    );

    let next = 0;
    for (const [role, quota] of quotas) {
      for (let i = 0; i < quota && next < ranked.length; i++) {
        ranked[next++].role = role;
      }
    }
    for (; next < ranked.length; next++) {
      ranked[next].role = 'worker';
    }
  }

  private distancesToCentroid(): number[] {
    const centroid = this.computeSwarmCentroid();
    return Array.from(this.agents.values(), agent => distance(agent.position, centroid));
  }
}

function clampFraction(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function parseDecisionConfig(input: Partial<DecisionConfig>): DecisionConfig {
  const result = DecisionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      'Invalid decision configuration',
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}
