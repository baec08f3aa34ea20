import { InMemoryContextDirectory } from './InMemoryContextDirectory.js';
import { InMemoryDecisionFramework } from './InMemoryDecisionFramework.js';
import { InMemoryMessagingBus } from './InMemoryMessagingBus.js';
import type { CollaboratorConfig, CollaboratorFactory, Collaborators } from './types.js';

/**
 * Default factory that creates in-process collaborators
 */
export class InMemoryCollaboratorFactory implements CollaboratorFactory {
  create(config: CollaboratorConfig): Collaborators {
    return {
      decision: new InMemoryDecisionFramework(config.decision),
      messaging: new InMemoryMessagingBus(config.messaging),
      context: new InMemoryContextDirectory(config.context),
    };
  }
}
