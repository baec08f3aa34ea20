/**
 * Swarm Error Classes
 */

/**
 * Base class for every error raised by the swarm package
 */
export class SwarmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SwarmError';
    Object.setPrototypeOf(this, SwarmError.prototype);
  }
}

/**
 * Raised when an operation needs initialize() to have run first
 */
export class SwarmNotInitializedError extends SwarmError {
  constructor(operation: string) {
    super(`Swarm not initialized: cannot ${operation} before initialize()`);
    this.name = 'SwarmNotInitializedError';
    Object.setPrototypeOf(this, SwarmNotInitializedError.prototype);
  }
}
