/**
 * Configuration Module Exports
 */

export {
  SwarmConfigSchema,
  DecisionConfigSchema,
  DecisionModeSchema,
  MessagingConfigSchema,
  ContextConfigSchema,
  type SwarmConfig,
  type SwarmConfigInput,
  type DecisionConfig,
  type DecisionMode,
  type MessagingConfig,
  type ContextConfig,
} from './schema.js';
export {
  loadSwarmConfig,
  parseSwarmConfig,
  parseYaml,
  substituteEnvVars,
  convertScalars,
} from './loader.js';
export { ConfigLoadError, ConfigValidationError } from './errors.js';
