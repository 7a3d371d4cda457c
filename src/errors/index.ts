import { ResourceKind } from '../types';

/**
 * Raised when the caller aborts the run. Never treated as a per-resource failure.
 */
export class CancelledError extends Error {
  constructor(message: string = 'cleanup cancelled') {
    super(message);
    this.name = 'CancelledError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by the polling waiter when its deadline passes
 */
export class WaitTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`timeout of ${timeoutMs}ms exceeded`);
    this.name = 'WaitTimeoutError';
    this.timeoutMs = timeoutMs;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A resource kind could not be listed at all; fatal for that kind's pass only
 */
export class EnumerationError extends Error {
  readonly kind: ResourceKind;

  constructor(kind: ResourceKind, cause: unknown) {
    super(`failed getting list of ${kind} resources: ${errorMessage(cause)}`, { cause });
    this.name = 'EnumerationError';
    this.kind = kind;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Re-throw cancellation from inside a catch block that otherwise logs and moves on
 */
export function rethrowIfCancelled(error: unknown, signal?: AbortSignal): void {
  if (error instanceof CancelledError) {
    throw error;
  }
  throwIfCancelled(signal);
}
