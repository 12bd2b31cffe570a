// SPDX-License-Identifier: MIT

export type AnalyticsErrorCode =
  | 'SENSOR_UNAVAILABLE'
  | 'CAPABILITY_ABSENT'
  | 'SERIALIZATION_FAILURE'
  | 'TRANSPORT_FAILURE';

/**
 * Base class of every error raised by the analytics agent.
 */
export class AnalyticsError extends Error {
  readonly code: AnalyticsErrorCode;

  constructor(code: AnalyticsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Identity or CPU information missing at startup. Fatal to agent construction only.
 */
export class SensorUnavailableError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SENSOR_UNAVAILABLE', message, options);
  }
}

/**
 * Exchange statistics are not supported by the host's current transfer mechanism.
 */
export class CapabilityAbsentError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CAPABILITY_ABSENT', message, options);
  }
}

export class SerializationError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SERIALIZATION_FAILURE', message, options);
  }
}

export class TransportError extends AnalyticsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_FAILURE', message, options);
  }
}

/**
 * Formats an unknown thrown value for logs and status.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
