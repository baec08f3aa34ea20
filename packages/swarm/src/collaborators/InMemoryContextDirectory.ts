/**
 * In-Memory Context Directory
 *
 * Per-agent bounded context history. Queries return the latest record of
 * each agent, or one agent's history oldest first.
 */

import { ContextConfigSchema, type ContextConfig } from '../config/schema.js';
import type { ContextDirectory, ContextRecord } from './types.js';

export class InMemoryContextDirectory implements ContextDirectory {
  private config: ContextConfig;
  private running = false;
  private history: Map<string, ContextRecord[]> = new Map();

  constructor(config: Partial<ContextConfig> = {}) {
    this.config = ContextConfigSchema.parse(config);
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  reset(): void {
    this.history.clear();
  }

  isRunning(): boolean {
    return this.running;
  }

  publishContext(record: ContextRecord): boolean {
    if (!this.running || record.agentId === '') {
      return false;
    }

    const records = this.history.get(record.agentId) ?? [];
    records.push(structuredClone(record));
    if (records.length > this.config.bufferSize) {
      records.shift();
    }
    this.history.set(record.agentId, records);

    return true;
  }

  queryContext(agentId?: string): ContextRecord[] {
    if (agentId) {
      return structuredClone(this.history.get(agentId) ?? []);
    }

    const latest: ContextRecord[] = [];
    for (const records of this.history.values()) {
      const last = records.at(-1);
      if (last) {
        latest.push(structuredClone(last));
      }
    }
    return latest;
  }
}
