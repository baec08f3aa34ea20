/**
 * @swarmkit/swarm
 *
 * Swarm coordination layer
 *
 * Provides:
 * - Agent and mission registries with lifecycle operations
 * - Periodic tick: state sync, formation commands, mission progress, health
 * - Emergency escalation on under-strength or low-energy swarms
 * - Pluggable decision, messaging and context collaborators
 * - YAML configuration with environment substitution
 */

// Coordinator exports
export {
  SwarmCoordinator,
  createSwarm,
  type MissionState,
  type SwarmState,
  type SwarmAgent,
  type AgentInput,
  type Mission,
  type MissionInput,
  type AgentFormationCommand,
  type SwarmMetrics,
  type SwarmEventType,
  type SwarmEvent,
  type SwarmCoordinatorEvents,
} from './coordinator/index.js';

// Collaborator exports
export {
  // Types
  type AgentRole,
  type BehaviorType,
  type AgentState,
  type TaskStatus,
  type SwarmTask,
  type NewTask,
  type EmergentBehavior,
  type MessageType,
  type MessagePriority,
  type SwarmMessage,
  type ContextRecord,
  type Lifecycle,
  type DecisionFramework,
  type MessagingBus,
  type ContextDirectory,
  type Collaborators,
  type CollaboratorConfig,
  type CollaboratorFactory,
  // Classes
  InMemoryDecisionFramework,
  InMemoryMessagingBus,
  InMemoryContextDirectory,
  InMemoryCollaboratorFactory,
} from './collaborators/index.js';

// Configuration exports
export {
  SwarmConfigSchema,
  DecisionConfigSchema,
  DecisionModeSchema,
  MessagingConfigSchema,
  ContextConfigSchema,
  loadSwarmConfig,
  parseSwarmConfig,
  parseYaml,
  substituteEnvVars,
  convertScalars,
  ConfigLoadError,
  ConfigValidationError,
  type SwarmConfig,
  type SwarmConfigInput,
  type DecisionConfig,
  type DecisionMode,
  type MessagingConfig,
  type ContextConfig,
} from './config/index.js';

export { SwarmError, SwarmNotInitializedError } from './errors.js';
export { Logger, logger, resolveLogLevel, type LogLevel } from './utils/logger.js';
