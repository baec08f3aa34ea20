/**
 * Swarm Coordinator - Main orchestrator for swarm operations
 *
 * Ties together:
 * - Agent and mission registries
 * - Formation control against a designated leader
 * - Decision, messaging and context collaborators
 * - Health monitoring and emergency escalation
 *
 * Every operation is synchronous and runs to completion on the event loop,
 * so registries and state flags are never observed half-updated. Operations
 * that touch several resources do so in the order agents, missions, state.
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import {
  FormationEngine,
  IDENTITY_QUATERNION,
  InvalidFormationParamsError,
  vec3,
  type FormationParams,
  type FormationType,
  type Vector3,
  type VehicleState,
} from '@swarmkit/formation';
import { InMemoryCollaboratorFactory } from '../collaborators/factory.js';
import type {
  AgentState,
  CollaboratorFactory,
  Collaborators,
  ContextRecord,
  EmergentBehavior,
  SwarmMessage,
  SwarmTask,
} from '../collaborators/types.js';
import { parseSwarmConfig } from '../config/loader.js';
import { ConfigValidationError } from '../config/errors.js';
import type { DecisionConfig, SwarmConfig, SwarmConfigInput } from '../config/schema.js';
import { SwarmNotInitializedError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type {
  AgentFormationCommand,
  AgentInput,
  Mission,
  MissionInput,
  MissionState,
  SwarmAgent,
  SwarmCoordinatorEvents,
  SwarmEventType,
  SwarmMetrics,
  SwarmState,
} from './types.js';

/** Agents below this energy level count as low on energy */
const LOW_ENERGY_LEVEL = 0.2;
/** Emergency when more than this fraction of agents is low on energy */
const LOW_ENERGY_FRACTION = 0.5;

const MESSAGE_TTL_SEC = 60;

interface Runtime {
  collaborators: Collaborators;
  formation: FormationEngine;
}

/**
 * Swarm Coordinator - Main orchestration class
 */
export class SwarmCoordinator extends EventEmitter<SwarmCoordinatorEvents> {
  private id: string;
  private config: SwarmConfig;
  private factory: CollaboratorFactory;
  private log: Logger;
  private runtime?: Runtime;

  private agents: Map<string, SwarmAgent> = new Map();
  private missions: Map<string, Mission> = new Map();
  private leaderId?: string;
  private lastCommands: AgentFormationCommand[] = [];

  private swarmState: SwarmState = 'idle';
  private running = false;
  private tickCount = 0;
  private startedAt = 0;
  private tickInterval?: ReturnType<typeof setInterval>;

  constructor(
    config: SwarmConfigInput = {},
    factory: CollaboratorFactory = new InMemoryCollaboratorFactory(),
    log: Logger = defaultLogger
  ) {
    super();
    this.config = parseSwarmConfig(config);
    this.id = this.config.id ?? `swarm-${uuidv4()}`;
    this.factory = factory;
    this.log = log.child({ component: 'SwarmCoordinator', swarmId: this.id });
  }

  // Lifecycle

  /**
   * (Re)build collaborators and the formation engine and clear all
   * registries. Stops a running swarm first. Without an argument the
   * current configuration is reused.
   */
  initialize(config?: SwarmConfigInput): void {
    const parsed = config === undefined ? this.config : parseSwarmConfig(config);

    if (this.running) {
      this.stop();
    }

    this.config = parsed;
    if (parsed.id) {
      this.id = parsed.id;
    }

    this.runtime = {
      collaborators: this.factory.create({
        decision: parsed.decision,
        messaging: parsed.messaging,
        context: parsed.context,
      }),
      formation: new FormationEngine(parsed.formation),
    };

    this.agents.clear();
    this.missions.clear();
    this.leaderId = undefined;
    this.lastCommands = [];
    this.tickCount = 0;
    this.swarmState = 'idle';

    this.log.info('Swarm initialized', {
      minAgents: parsed.minAgents,
      maxAgents: parsed.maxAgents,
      formation: parsed.formation.type,
    });
    this.emitEvent('initialized', { config: structuredClone(parsed) });
  }

  start(): void {
    const { collaborators } = this.requireRuntime('start');
    if (this.running) {
      return;
    }

    collaborators.messaging.start();
    collaborators.context.start();
    collaborators.decision.start();

    this.running = true;
    this.startedAt = Date.now();
    this.setSwarmState('idle');

    if (this.config.autoTick) {
      this.startTicking();
    }

    this.log.info('Swarm started', { autoTick: this.config.autoTick });
    this.emitEvent('started', { autoTick: this.config.autoTick });
  }

  /**
   * Stop ticking and the collaborators. A tick already in progress
   * completes; the running flag is only read when update() is entered.
   */
  stop(): void {
    this.stopTicking();

    const wasRunning = this.running;
    this.running = false;

    if (this.runtime) {
      const { collaborators } = this.runtime;
      collaborators.messaging.stop();
      collaborators.context.stop();
      collaborators.decision.stop();
    }

    this.setSwarmState('idle');

    if (wasRunning) {
      this.log.info('Swarm stopped', { ticks: this.tickCount });
      this.emitEvent('stopped', { ticks: this.tickCount });
    }
  }

  /**
   * Stop, then clear registries, the leader and collaborator state
   */
  reset(): void {
    this.stop();

    if (this.runtime) {
      const { collaborators, formation } = this.runtime;
      collaborators.messaging.reset();
      collaborators.context.reset();
      collaborators.decision.reset();
      formation.reset();
    }

    this.agents.clear();
    this.missions.clear();
    this.leaderId = undefined;
    this.lastCommands = [];
    this.tickCount = 0;

    this.log.info('Swarm reset');
    this.emitEvent('reset', {});
  }

  /**
   * One coordinator tick:
   * (a) pull agent state from the decision framework, republish contexts
   * (b) decision processing
   * (c) formation commands
   * (d) mission progress
   * (e) agent timeouts
   * (f) emergency check and global state
   */
  update(deltaTime: number): void {
    const runtime = this.requireRuntime('update');
    if (!this.running) {
      return;
    }

    const now = Date.now();
    this.tickCount++;

    this.synchronizeAgents(runtime.collaborators, now);

    runtime.collaborators.decision.update(deltaTime);

    if (this.config.enableAdaptiveFormation && this.leaderId !== undefined) {
      this.lastCommands = this.computeFormationCommands(runtime.formation);
      this.emitEvent('formation_updated', {
        leaderId: this.leaderId,
        commands: this.lastCommands.length,
      });
    }

    this.updateMissions(runtime.collaborators);
    this.checkAgentHealth(now);
    this.evaluateSwarmState();
  }

  // Agents

  /**
   * Register an agent, overwriting one with the same id. Refused while not
   * running, for an empty id, once the registry holds maxAgents entries
   * (even when the id is already present), or when a collaborator refuses
   * the registration. A refused agent leaves the registry untouched.
   */
  addAgent(input: AgentInput): boolean {
    const { collaborators } = this.requireRuntime('add agents');

    if (!this.running || input.id === '') {
      this.log.debug('Agent refused', { agentId: input.id, running: this.running });
      return false;
    }
    if (this.agents.size >= this.config.maxAgents) {
      this.log.debug('Agent refused, registry full', {
        agentId: input.id,
        maxAgents: this.config.maxAgents,
      });
      return false;
    }

    const agent = createAgent(input, Date.now());
    const { decision, messaging } = collaborators;
    const previous = decision.getAgentState(agent.id);

    if (!decision.registerAgent(structuredClone(agent.state))) {
      this.log.warn('Agent refused by decision framework', { agentId: agent.id });
      return false;
    }
    if (!messaging.registerAgent(agent.id, { ...agent.state.capabilities })) {
      if (previous) {
        decision.updateAgentState(previous);
      } else {
        decision.unregisterAgent(agent.id);
      }
      this.log.warn('Agent refused by messaging bus', { agentId: agent.id });
      return false;
    }

    this.agents.set(agent.id, agent);
    this.emitEvent('agent_added', { agentId: agent.id });
    return true;
  }

  removeAgent(agentId: string): boolean {
    const { collaborators } = this.requireRuntime('remove agents');

    if (!this.agents.delete(agentId)) {
      return false;
    }

    collaborators.decision.unregisterAgent(agentId);
    collaborators.messaging.unregisterAgent(agentId);

    if (this.leaderId === agentId) {
      this.leaderId = undefined;
      this.lastCommands = [];
      this.emitEvent('leader_changed', { leaderId: null, previousLeaderId: agentId });
    }

    this.emitEvent('agent_removed', { agentId });
    return true;
  }

  /**
   * Overwrite the given fields of a registered agent, restamp it and push
   * its state to the decision framework. State fields left out keep the
   * decision framework's values, so roles it assigned survive the update.
   * Connectivity flags left out are restored to connected.
   */
  updateAgent(input: AgentInput): boolean {
    const { collaborators } = this.requireRuntime('update agents');

    const current = this.agents.get(input.id);
    if (!current) {
      return false;
    }

    const now = Date.now();
    const state: AgentState = {
      ...(collaborators.decision.getAgentState(current.id) ?? current.state),
      ...structuredClone(input.state ?? {}),
      agentId: current.id,
      timestamp: now,
    };
    state.energyLevel = clampUnit(state.energyLevel);

    const updated: SwarmAgent = {
      id: current.id,
      state,
      context: {
        ...current.context,
        ...structuredClone(input.context ?? {}),
        agentId: current.id,
      },
      messagingConnected: input.messagingConnected ?? true,
      contextConnected: input.contextConnected ?? true,
      lastUpdate: now,
    };
    this.agents.set(updated.id, updated);

    collaborators.decision.updateAgentState(structuredClone(state));

    this.emitEvent('agent_updated', { agentId: updated.id });
    return true;
  }

  getAgent(agentId: string): SwarmAgent | undefined {
    this.requireRuntime('read agents');
    const agent = this.agents.get(agentId);
    return agent ? structuredClone(agent) : undefined;
  }

  getAllAgents(): SwarmAgent[] {
    this.requireRuntime('read agents');
    return Array.from(this.agents.values(), agent => structuredClone(agent));
  }

  getAgentCount(): number {
    return this.agents.size;
  }

  // Missions

  /**
   * Register a mission in `planning` and its tasks with the decision
   * framework. Returns the mission id, or undefined when not running, when
   * the id is already taken or when a task id is already in use.
   */
  createMission(input: MissionInput = {}): string | undefined {
    const { collaborators } = this.requireRuntime('create missions');

    if (!this.running) {
      this.log.debug('Mission refused, swarm not running');
      return undefined;
    }

    const id = input.id || `mission-${uuidv4()}`;
    if (this.missions.has(id)) {
      this.log.debug('Mission refused, duplicate id', { missionId: id });
      return undefined;
    }

    const taskIds = (input.tasks ?? []).flatMap(task => (task.id ? [task.id] : []));
    const takenTaskId = taskIds.find(
      (taskId, index) =>
        taskIds.indexOf(taskId) !== index || collaborators.decision.getTask(taskId) !== undefined
    );
    if (takenTaskId !== undefined) {
      this.log.debug('Mission refused, duplicate task id', {
        missionId: id,
        taskId: takenTaskId,
      });
      return undefined;
    }

    const tasks: SwarmTask[] = [];
    for (const task of input.tasks ?? []) {
      const taskId = collaborators.decision.createTask(task);
      const created = taskId === undefined ? undefined : collaborators.decision.getTask(taskId);
      if (created) {
        tasks.push(created);
      } else {
        this.log.warn('Task refused by decision framework', { missionId: id });
      }
    }

    this.missions.set(id, {
      id,
      type: input.type ?? 'generic',
      description: input.description ?? '',
      targetLocation: input.targetLocation ? { ...input.targetLocation } : vec3(),
      priority: input.priority ?? 0.5,
      assignedAgents: [...(input.assignedAgents ?? [])],
      tasks,
      state: 'planning',
      completionPercentage: 0,
      startTimestamp: Date.now(),
      deadlineTimestamp: input.deadlineTimestamp ?? 0,
      parameters: { ...input.parameters },
    });

    this.emitEvent('mission_created', { missionId: id, tasks: tasks.map(t => t.id) });
    this.refreshAggregateState();
    return id;
  }

  startMission(missionId: string): boolean {
    return this.transitionMission(missionId, 'start missions', () => 'executing');
  }

  pauseMission(missionId: string): boolean {
    return this.transitionMission(missionId, 'pause missions', () => 'paused');
  }

  /**
   * Resume a paused mission; fails from any other state
   */
  resumeMission(missionId: string): boolean {
    return this.transitionMission(missionId, 'resume missions', current =>
      current === 'paused' ? 'executing' : undefined
    );
  }

  abortMission(missionId: string): boolean {
    return this.transitionMission(missionId, 'abort missions', () => 'failed');
  }

  getMission(missionId: string): Mission | undefined {
    this.requireRuntime('read missions');
    const mission = this.missions.get(missionId);
    return mission ? structuredClone(mission) : undefined;
  }

  /**
   * Missions in planning or executing
   */
  getActiveMissions(): Mission[] {
    return this.getAllMissions().filter(
      mission => mission.state === 'planning' || mission.state === 'executing'
    );
  }

  getAllMissions(): Mission[] {
    this.requireRuntime('read missions');
    return Array.from(this.missions.values(), mission => structuredClone(mission));
  }

  /**
   * Report progress of a mission task to the decision framework. Mission
   * completion follows on the next tick.
   */
  updateTaskProgress(taskId: string, fraction: number): boolean {
    return this.requireRuntime('report task progress').collaborators.decision.updateTaskProgress(
      taskId,
      fraction
    );
  }

  completeTask(taskId: string): boolean {
    return this.requireRuntime('report task progress').collaborators.decision.completeTask(taskId);
  }

  // Formation

  setFormation(type: FormationType): void {
    const { formation } = this.requireRuntime('set the formation');
    this.applyFormationChange(() => formation.setFormationType(type));
  }

  /**
   * Use explicit leader-frame offsets, one per slot
   */
  setCustomFormation(offsets: readonly Vector3[]): void {
    const { formation } = this.requireRuntime('set the formation');
    this.applyFormationChange(() => formation.setCustomFormation(offsets));
  }

  setFormationParams(params: Partial<FormationParams>): void {
    const { formation } = this.requireRuntime('set formation parameters');
    this.applyFormationChange(() => formation.setParams(params));
  }

  setFormationLeader(agentId: string): boolean {
    this.requireRuntime('set the formation leader');

    if (!this.agents.has(agentId)) {
      return false;
    }

    const previousLeaderId = this.leaderId ?? null;
    this.leaderId = agentId;
    this.emitEvent('leader_changed', { leaderId: agentId, previousLeaderId });
    return true;
  }

  getFormationLeader(): string | undefined {
    return this.leaderId;
  }

  getFormationType(): FormationType {
    return this.requireRuntime('read the formation').formation.getType();
  }

  getFormationParams(): FormationParams {
    return this.requireRuntime('read the formation').formation.getParams();
  }

  /**
   * One command per registered agent against the current leader. The leader
   * takes slot 0 and the others follow in id order. Empty without a leader.
   */
  getFormationCommands(): AgentFormationCommand[] {
    const { formation } = this.requireRuntime('compute formation commands');
    return this.computeFormationCommands(formation);
  }

  /**
   * Commands computed by the most recent tick
   */
  getLastFormationCommands(): AgentFormationCommand[] {
    return structuredClone(this.lastCommands);
  }

  // Collective intelligence

  /**
   * Consensus decisions when enabled, centralized otherwise
   */
  enableCollectiveDecisionMaking(enable: boolean): void {
    this.configureDecision({ mode: enable ? 'consensus' : 'centralized' });
  }

  enableEmergentBehaviors(enable: boolean): void {
    this.configureDecision({ enableEmergentBehavior: enable });
  }

  enableDynamicRoleAssignment(enable: boolean): void {
    this.configureDecision({ enableDynamicRoles: enable });
  }

  getEmergentBehaviors(): EmergentBehavior[] {
    return this.requireRuntime('detect behaviors').collaborators.decision.detectEmergentBehaviors();
  }

  assessSwarmCapabilities(): Record<string, number> {
    return this.requireRuntime('assess capabilities').collaborators.decision.assessSwarmCapabilities();
  }

  // Messaging and context

  broadcastMessage(content: string, data: Record<string, string> = {}): boolean {
    const { collaborators } = this.requireRuntime('send messages');
    return collaborators.messaging.sendBroadcast(
      this.createMessage(`broadcast-${uuidv4()}`, 'broadcast', content, data)
    );
  }

  sendAgentMessage(toAgentId: string, content: string, data: Record<string, string> = {}): boolean {
    const { collaborators } = this.requireRuntime('send messages');
    return collaborators.messaging.sendMessage({
      ...this.createMessage(`msg-${uuidv4()}`, 'request', content, data),
      receiverId: toAgentId,
    });
  }

  /**
   * Drain the message inbox
   */
  getMessages(): SwarmMessage[] {
    return this.requireRuntime('receive messages').collaborators.messaging.receiveMessages();
  }

  publishContext(record: ContextRecord): boolean {
    return this.requireRuntime('publish context').collaborators.context.publishContext(record);
  }

  querySwarmContext(agentId?: string): ContextRecord[] {
    return this.requireRuntime('query context').collaborators.context.queryContext(agentId);
  }

  // Metrics and state

  getSwarmCentroid(): Vector3 {
    return this.requireRuntime('read metrics').collaborators.decision.computeSwarmCentroid();
  }

  getSwarmCohesion(): number {
    return this.requireRuntime('read metrics').collaborators.decision.computeSwarmCohesion();
  }

  getSwarmDispersion(): number {
    return this.requireRuntime('read metrics').collaborators.decision.computeSwarmDispersion();
  }

  getMetrics(): SwarmMetrics {
    const { decision } = this.requireRuntime('read metrics').collaborators;

    const missions: Record<MissionState, number> = {
      planning: 0,
      executing: 0,
      paused: 0,
      completed: 0,
      failed: 0,
    };
    for (const mission of this.missions.values()) {
      missions[mission.state]++;
    }

    const agents = Array.from(this.agents.values());

    return {
      swarmId: this.id,
      swarmState: this.swarmState,
      agentCount: agents.length,
      connectedAgents: agents.filter(a => a.messagingConnected || a.contextConnected).length,
      lowEnergyAgents: this.countLowEnergyAgents(),
      missions,
      tickCount: this.tickCount,
      centroid: decision.computeSwarmCentroid(),
      cohesion: decision.computeSwarmCohesion(),
      dispersion: decision.computeSwarmDispersion(),
      uptimeMs: this.running ? Date.now() - this.startedAt : 0,
      updatedAt: new Date(),
    };
  }

  getSwarmState(): SwarmState {
    return this.swarmState;
  }

  isRunning(): boolean {
    return this.running;
  }

  isInitialized(): boolean {
    return this.runtime !== undefined;
  }

  getConfig(): SwarmConfig {
    return structuredClone(this.config);
  }

  getId(): string {
    return this.id;
  }

  // Tick steps

  private synchronizeAgents(collaborators: Collaborators, now: number): void {
    for (const agent of this.agents.values()) {
      const authoritative = collaborators.decision.getAgentState(agent.id);
      if (authoritative) {
        agent.state = authoritative;
      }

      if (agent.contextConnected) {
        agent.context = {
          ...agent.context,
          position: { ...agent.state.position },
          velocity: { ...agent.state.velocity },
          orientation: { ...agent.state.orientation },
          timestamp: now,
        };
        collaborators.context.publishContext(structuredClone(agent.context));
      }
    }
  }

  private computeFormationCommands(formation: FormationEngine): AgentFormationCommand[] {
    const leader = this.leaderId === undefined ? undefined : this.agents.get(this.leaderId);
    if (!leader) {
      return [];
    }

    const followers = Array.from(this.agents.values())
      .filter(agent => agent.id !== leader.id)
      .sort((a, b) => compareIds(a.id, b.id));
    const ordered = [leader, ...followers];

    const states: VehicleState[] = ordered.map((agent, slot) => ({
      index: slot,
      position: agent.state.position,
      velocity: agent.state.velocity,
      orientation: agent.state.orientation,
    }));
    const leaderState = states[0];

    return ordered.map((agent, slot) => ({
      agentId: agent.id,
      slot,
      ...formation.computeCommand(slot, states[slot], states, leaderState),
    }));
  }

  /**
   * Progress of executing missions is the mean completion of their tasks
   */
  private updateMissions(collaborators: Collaborators): void {
    for (const mission of this.missions.values()) {
      if (mission.state !== 'executing' || mission.tasks.length === 0) {
        continue;
      }

      mission.tasks = mission.tasks.map(task => collaborators.decision.getTask(task.id) ?? task);
      const progress =
        mission.tasks.reduce((sum, task) => sum + task.completionPercentage, 0) / mission.tasks.length;
      mission.completionPercentage = clampUnit(progress);

      if (mission.completionPercentage >= 1) {
        this.setMissionState(mission, 'completed');
      }
    }
  }

  /**
   * Agents not refreshed within the timeout lose their connectivity flags.
   * They stay registered.
   */
  private checkAgentHealth(now: number): void {
    const timeoutMs = this.config.agentTimeoutSec * 1000;

    for (const agent of this.agents.values()) {
      const connected = agent.messagingConnected || agent.contextConnected;
      if (connected && now - agent.lastUpdate > timeoutMs) {
        agent.messagingConnected = false;
        agent.contextConnected = false;

        this.log.warn('Agent timed out', { agentId: agent.id, silentMs: now - agent.lastUpdate });
        this.emitEvent('agent_disconnected', { agentId: agent.id, lastUpdate: agent.lastUpdate });
      }
    }
  }

  private evaluateSwarmState(): void {
    const agentCount = this.agents.size;
    const lowEnergyAgents = this.countLowEnergyAgents();
    const emergency =
      agentCount < this.config.minAgents || lowEnergyAgents > agentCount * LOW_ENERGY_FRACTION;

    if (emergency) {
      if (this.swarmState !== 'emergency') {
        this.log.warn('Swarm entered emergency', { agentCount, lowEnergyAgents });
        this.setSwarmState('emergency');
        this.emitEvent('emergency_entered', { agentCount, lowEnergyAgents });
      }
      return;
    }

    const wasEmergency = this.swarmState === 'emergency';
    this.setSwarmState(this.aggregateMissionState());
    if (wasEmergency) {
      this.log.info('Swarm emergency cleared', { agentCount, lowEnergyAgents });
      this.emitEvent('emergency_cleared', { agentCount, lowEnergyAgents });
    }
  }

  // Helpers

  private requireRuntime(operation: string): Runtime {
    if (!this.runtime) {
      throw new SwarmNotInitializedError(operation);
    }
    return this.runtime;
  }

  private transitionMission(
    missionId: string,
    operation: string,
    next: (current: MissionState) => MissionState | undefined
  ): boolean {
    this.requireRuntime(operation);

    const mission = this.missions.get(missionId);
    if (!mission) {
      return false;
    }

    const target = next(mission.state);
    if (target === undefined) {
      return false;
    }

    this.setMissionState(mission, target);
    this.refreshAggregateState();
    return true;
  }

  private setMissionState(mission: Mission, state: MissionState): void {
    const from = mission.state;
    if (from === state) {
      return;
    }

    mission.state = state;
    this.emitEvent('mission_state_changed', { missionId: mission.id, from, to: state });

    if (state === 'completed') {
      this.log.info('Mission completed', { missionId: mission.id });
      this.emitEvent('mission_completed', { missionId: mission.id });
    }
  }

  /**
   * Global state follows the missions unless the swarm is in emergency
   */
  private refreshAggregateState(): void {
    if (this.swarmState !== 'emergency') {
      this.setSwarmState(this.aggregateMissionState());
    }
  }

  private aggregateMissionState(): SwarmState {
    const states = Array.from(this.missions.values(), mission => mission.state);

    if (states.length === 0) {
      return 'idle';
    }
    if (states.includes('executing')) {
      return 'executing';
    }
    if (states.includes('planning')) {
      return 'planning';
    }
    if (states.includes('paused')) {
      return 'idle';
    }
    return states.every(state => state === 'completed') ? 'completed' : 'failed';
  }

  private setSwarmState(state: SwarmState): void {
    const from = this.swarmState;
    if (from === state) {
      return;
    }

    this.swarmState = state;
    this.emitEvent('state_changed', { from, to: state });
  }

  private countLowEnergyAgents(): number {
    let count = 0;
    for (const agent of this.agents.values()) {
      if (agent.state.energyLevel < LOW_ENERGY_LEVEL) {
        count++;
      }
    }
    return count;
  }

  private applyFormationChange(change: () => void): void {
    const formation = this.requireRuntime('change the formation').formation;

    try {
      change();
    } catch (error) {
      if (error instanceof InvalidFormationParamsError) {
        throw new ConfigValidationError(error.message, error.issues);
      }
      throw error;
    }

    this.config.formation = formation.getParams();
    this.emitEvent('formation_changed', { type: formation.getType() });
  }

  private configureDecision(change: Partial<DecisionConfig>): void {
    const { decision } = this.requireRuntime('configure decisions').collaborators;
    decision.configure(change);
    this.config.decision = decision.getConfig();
  }

  private createMessage(
    id: string,
    type: SwarmMessage['type'],
    content: string,
    data: Record<string, string>
  ): SwarmMessage {
    return {
      id,
      senderId: this.config.messaging.agentId,
      type,
      content,
      data: { ...data },
      priority: 'medium',
      timestamp: Date.now(),
      ttlSec: MESSAGE_TTL_SEC,
    };
  }

  private startTicking(): void {
    const periodMs = 1000 / this.config.updateRateHz;
    const deltaTime = 1 / this.config.updateRateHz;

    this.tickInterval = setInterval(() => {
      this.update(deltaTime);
    }, periodMs);
  }

  private stopTicking(): void {
    if (this.tickInterval) {
      clearInterval(this.tickInterval);
      this.tickInterval = undefined;
    }
  }

  private emitEvent(type: SwarmEventType, data: Record<string, unknown>): void {
    this.emit('swarmEvent', {
      type,
      timestamp: new Date(),
      swarmId: this.id,
      data,
    });
  }
}

/**
 * Build a registry entry from caller input, filling defaults
 */
function createAgent(input: AgentInput, now: number): SwarmAgent {
  const given = structuredClone(input.state ?? {});
  const state: AgentState = {
    role: 'worker',
    position: vec3(),
    velocity: vec3(),
    orientation: { ...IDENTITY_QUATERNION },
    energyLevel: 1,
    capabilities: {},
    assignedTasks: [],
    behavior: 'formation',
    ...given,
    agentId: input.id,
    timestamp: now,
  };
  state.energyLevel = clampUnit(state.energyLevel);

  const context: ContextRecord = {
    position: { ...state.position },
    velocity: { ...state.velocity },
    orientation: { ...state.orientation },
    missionState: '',
    perception: {},
    planning: {},
    execution: {},
    ...structuredClone(input.context ?? {}),
    agentId: input.id,
    timestamp: now,
  };

  return {
    id: input.id,
    state,
    context,
    messagingConnected: input.messagingConnected ?? true,
    contextConnected: input.contextConnected ?? true,
    lastUpdate: now,
  };
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Create and initialize a coordinator
 */
export function createSwarm(
  config: SwarmConfigInput = {},
  factory?: CollaboratorFactory
): SwarmCoordinator {
  const coordinator = new SwarmCoordinator(config, factory);
  coordinator.initialize();
  return coordinator;
}
