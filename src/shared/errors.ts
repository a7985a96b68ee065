/**
 * Error hierarchy for the node lease suite.
 */

import type { ScenarioPhase, ScenarioReport } from './types';

/**
 * Base exception for configuration errors.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when the configuration file or SSM parameter does not exist.
 */
export class ConfigSourceNotFoundError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigSourceNotFoundError';
  }
}

/**
 * Raised when the configuration is missing required fields or is invalid.
 */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Raised when a polled condition does not hold before its timeout.
 */
export class ConvergenceTimeoutError extends Error {
  readonly description: string;
  readonly attempts: number;
  readonly lastError: string;

  constructor(description: string, timeoutMs: number, attempts: number, lastError: string) {
    super(
      `Timed out after ${timeoutMs}ms waiting for ${description} (${attempts} attempts): ${lastError}`
    );
    this.name = 'ConvergenceTimeoutError';
    this.description = description;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/**
 * Raised when an exact check inside the scenario fails.
 */
export class ScenarioAssertionError extends Error {
  readonly phase: ScenarioPhase;

  constructor(phase: ScenarioPhase, message: string) {
    super(message);
    this.name = 'ScenarioAssertionError';
    this.phase = phase;
  }
}

/**
 * Raised when the cluster could not be returned to its original shape.
 *
 * Always fatal: later suites would run against a damaged shared cluster.
 */
export class RestoreError extends Error {
  readonly report?: ScenarioReport;

  constructor(message: string, report?: ScenarioReport, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RestoreError';
    this.report = report;
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
