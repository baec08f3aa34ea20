import { z } from 'zod';
import { FormationParamsSchema } from '@swarmkit/formation';

/**
 * Zod schemas for swarm configuration.
 * Everything has a default, so `{}` is a valid configuration.
 */

export const DecisionModeSchema = z.enum(['centralized', 'distributed', 'consensus']);

export const DecisionConfigSchema = z.object({
  mode: DecisionModeSchema.default('distributed'),
  maxAgents: z.number().int().positive().default(100),
  enableEmergentBehavior: z.boolean().default(true),
  enableDynamicRoles: z.boolean().default(true),
});

export const MessagingConfigSchema = z.object({
  /** Sender id stamped on coordinator messages */
  agentId: z.string().min(1).default('coordinator'),
  bufferSize: z.number().int().positive().default(1000),
});

export const ContextConfigSchema = z.object({
  /** Records kept per agent */
  bufferSize: z.number().int().positive().default(1000),
});

export const SwarmConfigSchema = z
  .object({
    id: z.string().min(1).optional(),
    /** Below this many agents the swarm is in emergency */
    minAgents: z.number().int().nonnegative().default(2),
    maxAgents: z.number().int().positive().default(100),
    updateRateHz: z.number().positive().default(10),
    /** [s] Agents not refreshed for longer are marked disconnected */
    agentTimeoutSec: z.number().positive().default(5),
    enableAdaptiveFormation: z.boolean().default(true),
    /** Run update() on a timer while started */
    autoTick: z.boolean().default(false),
    formation: FormationParamsSchema.default({}),
    decision: DecisionConfigSchema.default({}),
    messaging: MessagingConfigSchema.default({}),
    context: ContextConfigSchema.default({}),
  })
  .refine(config => config.minAgents <= config.maxAgents, {
    message: 'minAgents must not exceed maxAgents',
    path: ['minAgents'],
  })
  .refine(config => config.decision.maxAgents >= config.maxAgents, {
    message: 'decision.maxAgents must not be below maxAgents',
    path: ['decision', 'maxAgents'],
  });

export type DecisionMode = z.output<typeof DecisionModeSchema>;
export type DecisionConfig = z.output<typeof DecisionConfigSchema>;
export type MessagingConfig = z.output<typeof MessagingConfigSchema>;
export type ContextConfig = z.output<typeof ContextConfigSchema>;
export type SwarmConfig = z.output<typeof SwarmConfigSchema>;
export type SwarmConfigInput = z.input<typeof SwarmConfigSchema>;
