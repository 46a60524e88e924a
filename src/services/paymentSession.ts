import { setTimeout as delay } from 'node:timers/promises';
import { createStore, type StoreApi } from 'zustand/vanilla';
import type { LocalCacheStore } from '../data/cacheStore';
import type { GivingDraft, GivingTransaction, PaymentSession, PaymentStatusReport } from '../types';
import type { Preferences } from '../utils/storage';
import {
  AmbiguousOutcomeError,
  CancelledError,
  GivingError,
  NetworkError,
  ProviderDeclineError,
  ValidationError,
  errorMessage,
  isCancelledError,
  isNetworkError,
} from './errors';
import type { GivingAPI } from './givingAPI';

export type PaymentPhase =
  | 'draft'
  | 'submitting'
  | 'awaiting_confirmation'
  | 'verifying'
  | 'completed'
  | 'failed'
  | 'unresolved';

export type PaymentGateway = Pick<GivingAPI, 'createPaymentSession' | 'checkPaymentStatus'>;

export interface ActiveSession extends PaymentSession {
  amount: number;
  categoryId: number;
  categoryName?: string;
  churchId: number;
}

export interface PaymentSessionState {
  phase: PaymentPhase;
  session: ActiveSession | null;
  transaction: GivingTransaction | null;
  attempts: number;
  error: GivingError | null;
}

export interface PaymentPolicy {
  pollIntervalMs: number;
  maxPollAttempts: number;
}

export interface PaymentSessionDeps {
  api: PaymentGateway;
  preferences: Preferences;
  cache: LocalCacheStore;
  policy: PaymentPolicy;
  /** Hands the member over to the provider's hosted payment page. */
  openPaymentPage: (url: string) => void | Promise<void>;
  /** `null` when the server named no numeric transaction id for the payment. */
  onSettled?: (transaction: GivingTransaction | null) => void;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => Date;
}

interface ValidDraft {
  amount: number;
  categoryId: number;
  categoryName?: string;
}

const IN_FLIGHT: readonly PaymentPhase[] = ['submitting', 'awaiting_confirmation', 'verifying'];

const SUBMITTABLE: readonly PaymentPhase[] = ['draft', 'failed', 'completed'];

const initialState = (): PaymentSessionState => ({
  phase: 'draft',
  session: null,
  transaction: null,
  attempts: 0,
  error: null,
});

const defaultSleep = (ms: number, signal: AbortSignal): Promise<void> => delay(ms, undefined, { signal });

export const validateDraft = (draft: GivingDraft): ValidDraft => {
  if (!Number.isFinite(draft.amount) || draft.amount <= 0) {
    throw new ValidationError('Enter an amount greater than zero');
  }
  if (draft.categoryId === null || !Number.isInteger(draft.categoryId)) {
    throw new ValidationError('Choose a giving category');
  }
  return {
    amount: draft.amount,
    categoryId: draft.categoryId,
    categoryName: draft.categoryName?.trim() || undefined,
  };
};

/**
 * Drives one gift from the entered amount to a settled transaction:
 * create the payment session, hand the member to the provider, then poll
 * until the backend reports a terminal status.
 *
 * One instance belongs to one hosting screen. `dispose()` when the screen goes
 * away; anything still in flight is abandoned without side effects.
 */
export class PaymentSessionManager {
  private readonly state: StoreApi<PaymentSessionState> = createStore<PaymentSessionState>()(initialState);
  private readonly controller = new AbortController();
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly now: () => Date;

  constructor(private readonly deps: PaymentSessionDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  getState(): PaymentSessionState {
    return this.state.getState();
  }

  subscribe(listener: (state: PaymentSessionState, previous: PaymentSessionState) => void): () => void {
    return this.state.subscribe(listener);
  }

  get disposed(): boolean {
    return this.controller.signal.aborted;
  }

  async submit(draft: GivingDraft): Promise<PaymentSession> {
    this.ensureActive();

    const { phase } = this.state.getState();
    if (IN_FLIGHT.includes(phase)) {
      throw new ValidationError('A payment is already in progress');
    }
    if (!SUBMITTABLE.includes(phase)) {
      throw new ValidationError('Check the outcome of your previous payment before starting a new one');
    }

    const gift = validateDraft(draft);
    this.state.setState({ ...initialState(), phase: 'submitting' });

    const churchId = await this.deps.preferences.getChurchId();
    this.ensureActive();

    let created: PaymentSession;
    try {
      created = await this.deps.api.createPaymentSession(
        { amount: gift.amount, categoryId: gift.categoryId, churchId },
        this.controller.signal
      );
    } catch (error) {
      if (this.disposed || isCancelledError(error)) {
        throw new CancelledError('Payment submission was cancelled');
      }
      const failure = isNetworkError(error) ? error : new NetworkError(errorMessage(error));
      console.error('Failed to create payment session:', failure.message);
      this.state.setState({ phase: 'failed', error: failure });
      throw failure;
    }
    this.ensureActive();

    const session: ActiveSession = { ...created, ...gift, churchId };
    this.state.setState({ phase: 'awaiting_confirmation', session });

    try {
      await this.deps.openPaymentPage(session.redirectUrl);
    } catch (error) {
      if (this.disposed) {
        throw new CancelledError('Payment submission was cancelled');
      }
      const failure = new GivingError(`Could not open the payment page: ${errorMessage(error)}`);
      console.error('Failed to hand over to the payment provider:', error);
      this.state.setState({ phase: 'failed', error: failure });
      throw failure;
    }
    return created;
  }

  /**
   * Poll the backend until the payment settles. Call once control comes back
   * from the provider, or again later after an unresolved outcome.
   *
   * Resolves `null` for a completed payment the server gave no numeric
   * transaction id; it reaches the cache with the next history refresh.
   */
  async verify(): Promise<GivingTransaction | null> {
    this.ensureActive();

    const { phase, session } = this.state.getState();
    if (!session || (phase !== 'awaiting_confirmation' && phase !== 'unresolved')) {
      throw new ValidationError('There is no payment waiting for confirmation');
    }

    const { pollIntervalMs, maxPollAttempts } = this.deps.policy;
    const { signal } = this.controller;
    this.state.setState({ phase: 'verifying', attempts: 0, error: null });

    for (let attempt = 1; attempt <= maxPollAttempts; attempt += 1) {
      if (attempt > 1) {
        await this.sleep(pollIntervalMs, signal).catch((error: unknown) => {
          throw this.disposed ? new CancelledError('Payment verification was cancelled') : error;
        });
      }
      this.ensureActive();

      let report: PaymentStatusReport | null = null;
      try {
        report = await this.deps.api.checkPaymentStatus(session.reference, signal);
      } catch (error) {
        if (this.disposed || isCancelledError(error)) {
          throw new CancelledError('Payment verification was cancelled');
        }
        // A failed check says nothing about the payment itself.
        console.warn(`Payment status check ${attempt}/${maxPollAttempts} failed:`, errorMessage(error));
      }
      this.ensureActive();
      this.state.setState({ attempts: attempt });

      if (report && report.status !== 'pending') {
        return this.settle(session, report);
      }
    }

    const error = new AmbiguousOutcomeError(session.reference, maxPollAttempts);
    this.state.setState({ phase: 'unresolved', error });
    throw error;
  }

  /** Back to an empty draft, unless a request is still in flight. */
  reset(): void {
    if (IN_FLIGHT.includes(this.state.getState().phase)) {
      throw new ValidationError('A payment is already in progress');
    }
    this.state.setState(initialState());
  }

  dispose(): void {
    this.controller.abort();
  }

  private settle(session: ActiveSession, report: PaymentStatusReport): GivingTransaction | null {
    const id = report.transactionId ?? session.transactionId;
    const transaction: GivingTransaction | null =
      id === undefined
        ? null
        : {
            id,
            category: session.categoryId,
            category_name: session.categoryName,
            amount: session.amount,
            date: report.processedAt ?? this.now().toISOString(),
            status: report.status,
          };

    if (transaction) {
      this.deps.cache.put('transactions', transaction);
    } else {
      console.warn(`Payment ${session.reference} settled without a transaction id; not cached`);
    }

    if (report.status === 'completed') {
      this.state.setState({ phase: 'completed', transaction });
      this.deps.onSettled?.(transaction);
      return transaction;
    }

    const error = new ProviderDeclineError(session.reference, report.message);
    this.state.setState({ phase: 'failed', transaction, error });
    this.deps.onSettled?.(transaction);
    throw error;
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new CancelledError('Payment flow was closed');
    }
  }
}
