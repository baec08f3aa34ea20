/**
 * In-Memory Messaging Bus
 *
 * Single bounded inbox shared by every registered agent. When the inbox is
 * full the oldest message is dropped.
 */

import { MessagingConfigSchema, type MessagingConfig } from '../config/schema.js';
import type { MessagingBus, SwarmMessage } from './types.js';

export class InMemoryMessagingBus implements MessagingBus {
  private config: MessagingConfig;
  private running = false;
  private agents: Map<string, Record<string, number>> = new Map();
  private inbox: SwarmMessage[] = [];
  private dropped = 0;

  constructor(config: Partial<MessagingConfig> = {}) {
    this.config = MessagingConfigSchema.parse(config);
  }

  start(): void {
    this.running = true;
  }

  stop(): void {
    this.running = false;
  }

  reset(): void {
    this.agents.clear();
    this.inbox = [];
    this.dropped = 0;
  }

  isRunning(): boolean {
    return this.running;
  }

  registerAgent(agentId: string, capabilities: Record<string, number>): boolean {
    if (agentId === '') {
      return false;
    }
    this.agents.set(agentId, { ...capabilities });
    return true;
  }

  unregisterAgent(agentId: string): boolean {
    return this.agents.delete(agentId);
  }

  getRegisteredAgents(): string[] {
    return Array.from(this.agents.keys());
  }

  /**
   * Queue a direct message; needs a sender and a receiver
   */
  sendMessage(message: SwarmMessage): boolean {
    if (!this.running || message.senderId === '') {
      return false;
    }
    if (message.type !== 'broadcast' && !message.receiverId) {
      return false;
    }

    this.inbox.push(structuredClone(message));
    while (this.inbox.length > this.config.bufferSize) {
      this.inbox.shift();
      this.dropped++;
    }
    return true;
  }

  sendBroadcast(message: SwarmMessage): boolean {
    if (!this.running) {
      return false;
    }
    return this.sendMessage({ ...message, receiverId: undefined, type: 'broadcast' });
  }

  receiveMessages(): SwarmMessage[] {
    const messages = this.inbox;
    this.inbox = [];
    return messages;
  }

  /** Messages dropped because the inbox was full */
  getDroppedCount(): number {
    return this.dropped;
  }
}
