/**
 * Configuration Error Classes
 *
 * Custom error types for configuration loading and validation.
 */

import { SwarmError } from '../errors.js';

export class ConfigLoadError extends SwarmError {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'ConfigLoadError';
    Object.setPrototypeOf(this, ConfigLoadError.prototype);
  }
}

export class ConfigValidationError extends SwarmError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }
}
