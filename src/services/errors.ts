import type { Notice } from '../types';

/**
 * Base class for every failure the giving flows raise on purpose.
 */
export class GivingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Bad user input, caught before anything goes over the network. */
export class ValidationError extends GivingError {}

/** Transport failure, non-2xx response or an envelope with `success: false`. */
export class NetworkError extends GivingError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}

/** The provider confirmed that the payment did not go through. */
export class ProviderDeclineError extends GivingError {
  readonly reference: string;
  readonly reason?: string;

  constructor(reference: string, reason?: string) {
    super(reason ? `Payment ${reference} was declined: ${reason}` : `Payment ${reference} was declined`);
    this.reference = reference;
    this.reason = reason;
  }
}

/**
 * Verification ran out of attempts before the payment reached a terminal
 * status. The payment may still complete later.
 */
export class AmbiguousOutcomeError extends GivingError {
  readonly reference: string;
  readonly attempts: number;

  constructor(reference: string, attempts: number) {
    super(`Payment ${reference} is still unresolved after ${attempts} checks`);
    this.reference = reference;
    this.attempts = attempts;
  }
}

/** The hosting screen went away; whatever was in flight is discarded. */
export class CancelledError extends GivingError {
  constructor(message = 'Operation cancelled') {
    super(message);
  }
}

export const isValidationError = (error: unknown): error is ValidationError => error instanceof ValidationError;

export const isNetworkError = (error: unknown): error is NetworkError => error instanceof NetworkError;

export const isProviderDeclineError = (error: unknown): error is ProviderDeclineError =>
  error instanceof ProviderDeclineError;

export const isAmbiguousOutcomeError = (error: unknown): error is AmbiguousOutcomeError =>
  error instanceof AmbiguousOutcomeError;

export const isCancelledError = (error: unknown): error is CancelledError => error instanceof CancelledError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error occurred';

/**
 * Turn any failure into a dismissible notice for the presentation layer.
 */
export const describeError = (error: unknown): Notice => {
  if (isValidationError(error)) {
    return { kind: 'error', title: 'Check your gift', message: error.message };
  }

  if (isNetworkError(error)) {
    return {
      kind: 'warning',
      title: 'Connection problem',
      message: 'We could not reach the server. Check your connection and try again.',
    };
  }

  if (isProviderDeclineError(error)) {
    return {
      kind: 'error',
      title: 'Payment declined',
      message: error.reason ?? 'The payment provider declined this payment.',
    };
  }

  if (isAmbiguousOutcomeError(error)) {
    return {
      kind: 'warning',
      title: 'Payment not confirmed yet',
      message: 'We could not confirm your payment yet. Check your giving history later.',
    };
  }

  return { kind: 'error', title: 'Something went wrong', message: errorMessage(error) };
};
