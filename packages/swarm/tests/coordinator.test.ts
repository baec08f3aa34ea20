/**
 * Tests for SwarmCoordinator
 *
 * Covers:
 * - Lifecycle and initialization preconditions
 * - Agent registry limits and updates
 * - Formation commands against the leader
 * - Collective intelligence toggles
 * - Messaging and context passthroughs
 * - Swarm metrics
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SwarmCoordinator, createSwarm } from '../src/coordinator/SwarmCoordinator.js';
import { InMemoryCollaboratorFactory } from '../src/collaborators/factory.js';
import { InMemoryDecisionFramework } from '../src/collaborators/InMemoryDecisionFramework.js';
import { InMemoryMessagingBus } from '../src/collaborators/InMemoryMessagingBus.js';
import type {
  CollaboratorConfig,
  Collaborators,
  ContextRecord,
} from '../src/collaborators/types.js';
import { ConfigValidationError } from '../src/config/errors.js';
import type { SwarmConfigInput } from '../src/config/schema.js';
import { SwarmNotInitializedError } from '../src/errors.js';
import type { SwarmEvent } from '../src/coordinator/types.js';

function startedSwarm(config: SwarmConfigInput = {}): SwarmCoordinator {
  const coordinator = new SwarmCoordinator(config);
  coordinator.initialize();
  coordinator.start();
  return coordinator;
}

/**
 * Factory that keeps a handle on the collaborators it builds
 */
class CapturingFactory extends InMemoryCollaboratorFactory {
  created: Collaborators[] = [];

  create(config: CollaboratorConfig): Collaborators {
    const collaborators = super.create(config);
    this.created.push(collaborators);
    return collaborators;
  }
}

/**
 * Factory whose decision framework holds at most two agents
 */
class SmallDecisionFactory extends InMemoryCollaboratorFactory {
  create(config: CollaboratorConfig): Collaborators {
    return {
      ...super.create(config),
      decision: new InMemoryDecisionFramework({ ...config.decision, maxAgents: 2 }),
    };
  }
}

/**
 * Messaging bus that refuses agent "blocked"
 */
class BlockingMessagingBus extends InMemoryMessagingBus {
  registerAgent(agentId: string, capabilities: Record<string, number>): boolean {
    return agentId !== 'blocked' && super.registerAgent(agentId, capabilities);
  }
}

class BlockingMessagingFactory extends InMemoryCollaboratorFactory {
  created: Collaborators[] = [];

  create(config: CollaboratorConfig): Collaborators {
    const collaborators = {
      ...super.create(config),
      messaging: new BlockingMessagingBus(config.messaging),
    };
    this.created.push(collaborators);
    return collaborators;
  }
}

describe('SwarmCoordinator', () => {
  let coordinator: SwarmCoordinator;

  afterEach(() => {
    coordinator.stop();
  });

  describe('initialization', () => {
    beforeEach(() => {
      coordinator = new SwarmCoordinator({ id: 'test-swarm' });
    });

    it('should reject operations before initialize', () => {
      expect(coordinator.isInitialized()).toBe(false);
      expect(() => coordinator.start()).toThrow(SwarmNotInitializedError);
      expect(() => coordinator.update(0.1)).toThrow(SwarmNotInitializedError);
      expect(() => coordinator.addAgent({ id: 'a' })).toThrow(SwarmNotInitializedError);
      expect(() => coordinator.createMission()).toThrow(SwarmNotInitializedError);
      expect(() => coordinator.getFormationCommands()).toThrow(SwarmNotInitializedError);
    });

    it('should validate configuration eagerly', () => {
      expect(() => new SwarmCoordinator({ minAgents: 5, maxAgents: 2 })).toThrow(ConfigValidationError);
    });

    it('should start idle and running', () => {
      coordinator.initialize();
      coordinator.start();

      expect(coordinator.isInitialized()).toBe(true);
      expect(coordinator.isRunning()).toBe(true);
      expect(coordinator.getSwarmState()).toBe('idle');
      expect(coordinator.getId()).toBe('test-swarm');
    });

    it('should emit lifecycle events', () => {
      const events: SwarmEvent[] = [];
      coordinator.on('swarmEvent', event => events.push(event));

      coordinator.initialize();
      coordinator.start();
      coordinator.stop();

      expect(events.map(e => e.type)).toEqual(['initialized', 'started', 'stopped']);
      expect(events[0].swarmId).toBe('test-swarm');
    });

    it('should stop a running swarm and clear registries when initialized again', () => {
      coordinator.initialize();
      coordinator.start();
      coordinator.addAgent({ id: 'a' });

      coordinator.initialize({ id: 'test-swarm', maxAgents: 3 });

      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.getAgentCount()).toBe(0);
      expect(coordinator.getConfig().maxAgents).toBe(3);
    });

    it('should build fresh collaborators on every initialize', () => {
      const factory = new CapturingFactory();
      coordinator = new SwarmCoordinator({}, factory);

      coordinator.initialize();
      coordinator.initialize();

      expect(factory.created).toHaveLength(2);
      expect(factory.created[0]).not.toBe(factory.created[1]);
    });

    it('should create an initialized swarm through createSwarm', () => {
      coordinator = createSwarm({ id: 'factory-swarm' });

      expect(coordinator.isInitialized()).toBe(true);
      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.getId()).toBe('factory-swarm');
    });
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      coordinator = startedSwarm({ minAgents: 0 });
    });

    it('should ignore update while stopped', () => {
      coordinator.update(0.1);
      coordinator.stop();
      coordinator.update(0.1);

      expect(coordinator.getMetrics().tickCount).toBe(1);
    });

    it('should refuse new agents while stopped', () => {
      coordinator.stop();

      expect(coordinator.addAgent({ id: 'a' })).toBe(false);
      expect(coordinator.getAgentCount()).toBe(0);
    });

    it('should clear agents, missions and leader on reset', () => {
      coordinator.addAgent({ id: 'a' });
      coordinator.setFormationLeader('a');
      coordinator.createMission({ id: 'm1' });

      coordinator.reset();

      expect(coordinator.isRunning()).toBe(false);
      expect(coordinator.getAgentCount()).toBe(0);
      expect(coordinator.getAllMissions()).toEqual([]);
      expect(coordinator.getFormationLeader()).toBeUndefined();
      expect(coordinator.getSwarmState()).toBe('idle');
    });

    it('should be restartable after reset', () => {
      coordinator.reset();
      coordinator.start();

      expect(coordinator.addAgent({ id: 'a' })).toBe(true);
    });
  });

  describe('agents', () => {
    beforeEach(() => {
      coordinator = startedSwarm({ minAgents: 1, maxAgents: 3 });
    });

    it('should register an agent with defaults', () => {
      expect(coordinator.addAgent({ id: 'a' })).toBe(true);

      const agent = coordinator.getAgent('a');
      expect(agent?.state.agentId).toBe('a');
      expect(agent?.state.role).toBe('worker');
      expect(agent?.state.energyLevel).toBe(1);
      expect(agent?.state.position).toEqual({ x: 0, y: 0, z: 0 });
      expect(agent?.messagingConnected).toBe(true);
      expect(agent?.contextConnected).toBe(true);
    });

    it('should refuse an empty id', () => {
      expect(coordinator.addAgent({ id: '' })).toBe(false);
      expect(coordinator.getAgentCount()).toBe(0);
    });

    it('should refuse agents once the registry is full', () => {
      expect(coordinator.addAgent({ id: 'a' })).toBe(true);
      expect(coordinator.addAgent({ id: 'b' })).toBe(true);
      expect(coordinator.addAgent({ id: 'c' })).toBe(true);

      expect(coordinator.addAgent({ id: 'd' })).toBe(false);
      expect(coordinator.addAgent({ id: 'a', state: { energyLevel: 0.5 } })).toBe(false);
      expect(coordinator.getAgentCount()).toBe(3);
      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(1);
    });

    it('should overwrite an agent with the same id below capacity', () => {
      coordinator.addAgent({ id: 'a', state: { energyLevel: 0.5 } });
      coordinator.addAgent({ id: 'a', state: { energyLevel: 0.9 } });

      expect(coordinator.getAgentCount()).toBe(1);
      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(0.9);
    });

    it('should clamp energy into the unit range', () => {
      coordinator.addAgent({ id: 'a', state: { energyLevel: 1.5 } });
      coordinator.addAgent({ id: 'b', state: { energyLevel: -1 } });

      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(1);
      expect(coordinator.getAgent('b')?.state.energyLevel).toBe(0);
    });

    it('should register agents with the collaborators', () => {
      const factory = new CapturingFactory();
      coordinator = new SwarmCoordinator({}, factory);
      coordinator.initialize();
      coordinator.start();

      coordinator.addAgent({ id: 'a', state: { capabilities: { camera: 1 } } });

      const [collaborators] = factory.created;
      expect(collaborators.decision.getAgentState('a')?.capabilities).toEqual({ camera: 1 });
    });

    it('should refuse agents the decision framework refuses', () => {
      coordinator = new SwarmCoordinator({ maxAgents: 10 }, new SmallDecisionFactory());
      coordinator.initialize();
      coordinator.start();
      const added: string[] = [];
      coordinator.on('swarmEvent', event => {
        if (event.type === 'agent_added') {
          added.push(String(event.data.agentId));
        }
      });

      const results = [0, 100, 200].map((x, i) =>
        coordinator.addAgent({ id: `agent-${i}`, state: { position: { x, y: 0, z: 0 } } })
      );

      expect(results).toEqual([true, true, false]);
      expect(added).toEqual(['agent-0', 'agent-1']);
      expect(coordinator.getAgentCount()).toBe(2);
      expect(coordinator.getAgent('agent-2')).toBeUndefined();
      expect(coordinator.getSwarmCentroid()).toEqual({ x: 50, y: 0, z: 0 });
    });

    it('should still overwrite a known agent when the decision framework is full', () => {
      coordinator = new SwarmCoordinator({ maxAgents: 10 }, new SmallDecisionFactory());
      coordinator.initialize();
      coordinator.start();
      coordinator.addAgent({ id: 'a' });
      coordinator.addAgent({ id: 'b' });

      expect(coordinator.addAgent({ id: 'a', state: { energyLevel: 0.5 } })).toBe(true);
      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(0.5);
    });

    it('should roll back the decision framework when messaging refuses an agent', () => {
      const factory = new BlockingMessagingFactory();
      coordinator = new SwarmCoordinator({}, factory);
      coordinator.initialize();
      coordinator.start();

      expect(coordinator.addAgent({ id: 'blocked' })).toBe(false);

      const [collaborators] = factory.created;
      expect(coordinator.getAgentCount()).toBe(0);
      expect(collaborators.decision.getAgentState('blocked')).toBeUndefined();
    });

    it('should fail to remove an unknown agent without side effects', () => {
      coordinator.addAgent({ id: 'a' });

      expect(coordinator.removeAgent('ghost')).toBe(false);
      expect(coordinator.getAgentCount()).toBe(1);
    });

    it('should remove an agent and release its slot', () => {
      coordinator.addAgent({ id: 'a' });
      coordinator.addAgent({ id: 'b' });
      coordinator.addAgent({ id: 'c' });

      expect(coordinator.removeAgent('b')).toBe(true);
      expect(coordinator.getAgent('b')).toBeUndefined();
      expect(coordinator.addAgent({ id: 'd' })).toBe(true);
    });

    it('should clear the leader when the leader is removed', () => {
      coordinator.addAgent({ id: 'a' });
      coordinator.setFormationLeader('a');

      coordinator.removeAgent('a');

      expect(coordinator.getFormationLeader()).toBeUndefined();
    });

    it('should merge updates into the registered agent', () => {
      coordinator.addAgent({ id: 'a', state: { position: { x: 1, y: 2, z: 3 } } });

      expect(coordinator.updateAgent({ id: 'a', state: { energyLevel: 0.4 } })).toBe(true);

      const agent = coordinator.getAgent('a');
      expect(agent?.state.energyLevel).toBe(0.4);
      expect(agent?.state.position).toEqual({ x: 1, y: 2, z: 3 });
    });

    it('should fail to update an unknown agent', () => {
      expect(coordinator.updateAgent({ id: 'ghost' })).toBe(false);
      expect(coordinator.getAgentCount()).toBe(0);
    });

    it('should keep updates across ticks', () => {
      coordinator.addAgent({ id: 'a' });
      coordinator.updateAgent({ id: 'a', state: { energyLevel: 0.4 } });

      coordinator.update(0.1);

      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(0.4);
    });

    it('should return copies of registry entries', () => {
      coordinator.addAgent({ id: 'a' });

      const copy = coordinator.getAgent('a');
      if (copy) {
        copy.state.energyLevel = 0;
      }

      expect(coordinator.getAgent('a')?.state.energyLevel).toBe(1);
    });
  });

  describe('formation', () => {
    beforeEach(() => {
      coordinator = startedSwarm({ formation: { type: 'diamond', spacing: 5 } });
    });

    it('should refuse an unknown leader', () => {
      expect(coordinator.setFormationLeader('ghost')).toBe(false);
      expect(coordinator.getFormationLeader()).toBeUndefined();
    });

    it('should return no commands without a leader', () => {
      coordinator.addAgent({ id: 'a' });
      expect(coordinator.getFormationCommands()).toEqual([]);
    });

    it('should put the leader in slot 0 and the others in id order', () => {
      for (const id of ['lead', 'c', 'a', 'b']) {
        coordinator.addAgent({ id });
      }
      coordinator.setFormationLeader('lead');

      const commands = coordinator.getFormationCommands();

      expect(commands.map(c => [c.agentId, c.slot])).toEqual([
        ['lead', 0],
        ['a', 1],
        ['b', 2],
        ['c', 3],
      ]);
    });

    it('should place four agents on the diamond around the leader', () => {
      for (const id of ['lead', 'a', 'b', 'c']) {
        coordinator.addAgent({ id });
      }
      coordinator.setFormationLeader('lead');

      const positions = coordinator.getFormationCommands().map(c => c.desiredPosition);

      expect(positions).toEqual([
        { x: 5, y: 0, z: 0 },
        { x: 0, y: 5, z: 0 },
        { x: -5, y: 0, z: 0 },
        { x: 0, y: -5, z: 0 },
      ]);
    });

    it('should cache commands computed by the tick', () => {
      coordinator.addAgent({ id: 'a' });
      coordinator.addAgent({ id: 'b' });
      coordinator.setFormationLeader('a');

      expect(coordinator.getLastFormationCommands()).toEqual([]);
      coordinator.update(0.1);

      expect(coordinator.getLastFormationCommands().map(c => c.agentId)).toEqual(['a', 'b']);
    });

    it('should skip formation commands when adaptive formation is off', () => {
      coordinator.initialize({ enableAdaptiveFormation: false });
      coordinator.start();
      coordinator.addAgent({ id: 'a' });
      coordinator.addAgent({ id: 'b' });
      coordinator.setFormationLeader('a');

      coordinator.update(0.1);

      expect(coordinator.getLastFormationCommands()).toEqual([]);
    });

    it('should switch formation type and keep the config in step', () => {
      coordinator.setFormation('column');

      expect(coordinator.getFormationType()).toBe('column');
      expect(coordinator.getConfig().formation.type).toBe('column');
    });

    it('should switch to custom offsets', () => {
      coordinator.setCustomFormation([{ x: -3, y: 0, z: 0 }]);

      expect(coordinator.getFormationType()).toBe('custom');
    });

    it('should reject invalid formation parameters', () => {
      expect(() => coordinator.setFormationParams({ spacing: -1 })).toThrow(ConfigValidationError);
      expect(coordinator.getFormationParams().spacing).toBe(5);
    });

    it('should apply valid formation parameters', () => {
      coordinator.setFormationParams({ spacing: 8, maxVelocity: 4 });

      expect(coordinator.getFormationParams().spacing).toBe(8);
      expect(coordinator.getConfig().formation.maxVelocity).toBe(4);
    });
  });

  describe('collective intelligence', () => {
    beforeEach(() => {
      coordinator = startedSwarm();
    });

    it('should switch between consensus and centralized decisions', () => {
      coordinator.enableCollectiveDecisionMaking(true);
      expect(coordinator.getConfig().decision.mode).toBe('consensus');

      coordinator.enableCollectiveDecisionMaking(false);
      expect(coordinator.getConfig().decision.mode).toBe('centralized');
    });

    it('should toggle emergent behaviors and dynamic roles', () => {
      coordinator.enableEmergentBehaviors(false);
      coordinator.enableDynamicRoleAssignment(false);

      const { decision } = coordinator.getConfig();
      expect(decision.enableEmergentBehavior).toBe(false);
      expect(decision.enableDynamicRoles).toBe(false);
    });

    it('should pick up roles assigned by the decision framework on the next tick', () => {
      coordinator.addAgent({ id: 'a', state: { energyLevel: 0.3 } });
      coordinator.addAgent({ id: 'b', state: { energyLevel: 0.9 } });
      coordinator.addAgent({ id: 'c', state: { energyLevel: 0.5 } });

      coordinator.update(0.1);
      expect(coordinator.getAgent('b')?.state.role).toBe('worker');

      coordinator.update(0.1);
      expect(coordinator.getAgent('b')?.state.role).toBe('leader');
      expect(coordinator.getAgent('a')?.state.role).toBe('worker');
    });

    it('should keep assigned roles across agent updates', () => {
      coordinator.addAgent({ id: 'a', state: { energyLevel: 0.3 } });
      coordinator.addAgent({ id: 'b', state: { energyLevel: 0.9 } });
      coordinator.update(0.1);

      coordinator.updateAgent({ id: 'b', state: { position: { x: 1, y: 0, z: 0 } } });

      expect(coordinator.getAgent('b')?.state.role).toBe('leader');
      expect(coordinator.getAgent('b')?.state.position).toEqual({ x: 1, y: 0, z: 0 });
    });

    it('should keep roles when dynamic role assignment is off', () => {
      coordinator.enableDynamicRoleAssignment(false);
      coordinator.addAgent({ id: 'a', state: { role: 'scout' } });
      coordinator.addAgent({ id: 'b' });

      coordinator.update(0.1);
      coordinator.update(0.1);

      expect(coordinator.getAgent('a')?.state.role).toBe('scout');
    });

    it('should detect aggregation and formation in a tight cluster', () => {
      coordinator.addAgent({ id: 'a', state: { position: { x: 0, y: 0, z: 0 } } });
      coordinator.addAgent({ id: 'b', state: { position: { x: 1, y: 0, z: 0 } } });
      coordinator.addAgent({ id: 'c', state: { position: { x: 0, y: 1, z: 0 } } });

      const types = coordinator.getEmergentBehaviors().map(b => b.type);

      expect(types).toEqual(['aggregation', 'formation']);
    });

    it('should sum capabilities across agents', () => {
      coordinator.addAgent({ id: 'a', state: { capabilities: { camera: 1, lidar: 0.5 } } });
      coordinator.addAgent({ id: 'b', state: { capabilities: { camera: 0.5 } } });

      expect(coordinator.assessSwarmCapabilities()).toEqual({ camera: 1.5, lidar: 0.5 });
    });
  });

  describe('messaging and context', () => {
    beforeEach(() => {
      coordinator = startedSwarm();
    });

    it('should queue broadcast and direct messages from the coordinator', () => {
      expect(coordinator.broadcastMessage('hello')).toBe(true);
      expect(coordinator.sendAgentMessage('a', 'ping', { seq: '1' })).toBe(true);

      const messages = coordinator.getMessages();

      expect(messages).toHaveLength(2);
      expect(messages[0].type).toBe('broadcast');
      expect(messages[0].receiverId).toBeUndefined();
      expect(messages[0].senderId).toBe('coordinator');
      expect(messages[1].type).toBe('request');
      expect(messages[1].receiverId).toBe('a');
      expect(messages[1].data).toEqual({ seq: '1' });
    });

    it('should drain messages on read', () => {
      coordinator.broadcastMessage('hello');
      coordinator.getMessages();

      expect(coordinator.getMessages()).toEqual([]);
    });

    it('should refuse messages while stopped', () => {
      coordinator.stop();

      expect(coordinator.broadcastMessage('hello')).toBe(false);
      expect(coordinator.sendAgentMessage('a', 'ping')).toBe(false);
    });

    it('should publish contexts of context-connected agents on every tick', () => {
      coordinator.addAgent({ id: 'a', state: { position: { x: 1, y: 2, z: 3 } } });
      coordinator.addAgent({ id: 'b', contextConnected: false });

      coordinator.update(0.1);
      coordinator.update(0.1);

      const latest = coordinator.querySwarmContext();
      expect(latest.map(record => record.agentId)).toEqual(['a']);
      expect(latest[0].position).toEqual({ x: 1, y: 2, z: 3 });
      expect(coordinator.querySwarmContext('a')).toHaveLength(2);
    });

    it('should pass published context through to the directory', () => {
      const record: ContextRecord = {
        agentId: 'observer',
        position: { x: 0, y: 0, z: 10 },
        velocity: { x: 0, y: 0, z: 0 },
        orientation: { w: 1, x: 0, y: 0, z: 0 },
        missionState: 'survey',
        perception: { obstacles: '0' },
        planning: {},
        execution: {},
        timestamp: 1,
      };

      expect(coordinator.publishContext(record)).toBe(true);
      expect(coordinator.querySwarmContext('observer')).toEqual([record]);
    });
  });

  describe('metrics', () => {
    beforeEach(() => {
      coordinator = startedSwarm();
      coordinator.addAgent({ id: 'a', state: { position: { x: 0, y: 0, z: 0 } } });
      coordinator.addAgent({ id: 'b', state: { position: { x: 2, y: 0, z: 0 }, energyLevel: 0.1 } });
    });

    it('should compute centroid, cohesion and dispersion', () => {
      expect(coordinator.getSwarmCentroid()).toEqual({ x: 1, y: 0, z: 0 });
      expect(coordinator.getSwarmCohesion()).toBeCloseTo(1 / 1.1, 10);
      expect(coordinator.getSwarmDispersion()).toBeCloseTo(1, 10);
    });

    it('should summarize the swarm', () => {
      coordinator.createMission({ id: 'm1' });
      coordinator.createMission({ id: 'm2' });
      coordinator.startMission('m2');
      coordinator.update(0.1);

      const metrics = coordinator.getMetrics();

      expect(metrics.agentCount).toBe(2);
      expect(metrics.connectedAgents).toBe(2);
      expect(metrics.lowEnergyAgents).toBe(1);
      expect(metrics.tickCount).toBe(1);
      expect(metrics.swarmState).toBe('executing');
      expect(metrics.missions).toEqual({
        planning: 1,
        executing: 1,
        paused: 0,
        completed: 0,
        failed: 0,
      });
    });
  });
});
