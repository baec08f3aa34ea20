/**
 * Collaborators Module Exports
 */

export {
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
} from './types.js';
export { InMemoryDecisionFramework } from './InMemoryDecisionFramework.js';
export { InMemoryMessagingBus } from './InMemoryMessagingBus.js';
export { InMemoryContextDirectory } from './InMemoryContextDirectory.js';
export { InMemoryCollaboratorFactory } from './factory.js';
