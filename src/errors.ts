/**
 * Activation errors
 * Every failure of an activation attempt is one of these kinds.
 * They are surfaced as a message, never thrown out of the store.
 */

export type ActivationErrorKind =
  | 'missing_code'
  | 'already_activated'
  | 'transport'
  | 'invalid_response'
  | 'threshold_not_met';

export abstract class ActivationError extends Error {
  abstract readonly kind: ActivationErrorKind;
}

export class MissingCodeError extends ActivationError {
  readonly kind = 'missing_code';

  constructor() {
    super('Activation failed: missing code.');
    this.name = 'MissingCodeError';
  }
}

export class AlreadyActivatedError extends ActivationError {
  readonly kind = 'already_activated';

  constructor(readonly code: string) {
    super('Card is already activated.');
    this.name = 'AlreadyActivatedError';
  }
}

// No response at all: fetch rejected or the request timed out
export class TransportError extends ActivationError {
  readonly kind = 'transport';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class InvalidResponseError extends ActivationError {
  readonly kind = 'invalid_response';

  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'InvalidResponseError';
  }
}

export class ThresholdNotMetError extends ActivationError {
  readonly kind = 'threshold_not_met';

  constructor(readonly version: number, readonly threshold: number) {
    super(`Activation failed (version = ${version})`);
    this.name = 'ThresholdNotMetError';
  }
}
