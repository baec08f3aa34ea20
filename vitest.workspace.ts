import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'formation',
      root: './packages/formation',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'swarm',
      root: './packages/swarm',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'cli',
      root: './packages/cli',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
]);
