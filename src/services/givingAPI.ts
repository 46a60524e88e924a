import type {
  AppNotification,
  Church,
  FinancialSummary,
  GivingCategory,
  GivingHistory,
  PaymentSession,
  PaymentSessionRequest,
  PaymentStatusReport,
  Pledge,
  RecurringGiving,
  RecurringGivingStatus,
  UserProfile,
} from '../types';
import type { Preferences } from '../utils/storage';
import {
  parseCategory,
  parseChurch,
  parseEnvelope,
  parseFinancialSummary,
  parseGivingHistory,
  parseList,
  parseNotification,
  parsePaymentSession,
  parsePaymentStatus,
  parsePledge,
  parseProfile,
  parseRecurringGiving,
  type Parser,
} from './apiParsers';
import { CancelledError, NetworkError, errorMessage, isCancelledError } from './errors';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface GivingAPIOptions {
  baseUrl: string;
  preferences: Preferences;
  fetchImpl?: FetchLike;
}

export interface RequestOptions {
  method?: 'GET' | 'POST' | 'PATCH';
  body?: unknown;
  signal?: AbortSignal;
}

export interface HistoryQuery {
  page?: number;
  pageSize?: number;
  signal?: AbortSignal;
}

export class GivingAPI {
  private readonly baseUrl: string;
  private readonly preferences: Preferences;
  private readonly fetchImpl: FetchLike;

  constructor({ baseUrl, preferences, fetchImpl = (input, init) => fetch(input, init) }: GivingAPIOptions) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.preferences = preferences;
    this.fetchImpl = fetchImpl;
  }

  private async request<T>(endpoint: string, parser: Parser<T>, options: RequestOptions = {}): Promise<T> {
    const url = `${this.baseUrl}${endpoint}`;
    const token = await this.preferences.getAuthToken();

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (token) {
      headers.Authorization = `Token ${token}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: options.method ?? 'GET',
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: options.signal,
      });
    } catch (error) {
      throw this.transportError(endpoint, error, options.signal);
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => 'Unknown error');
      console.error('Giving API error:', response.status, endpoint, errorText);
      throw new NetworkError(`Giving API error: ${response.status} ${response.statusText}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw this.transportError(endpoint, error, options.signal);
    }

    return parseEnvelope(body, parser, endpoint);
  }

  private transportError(endpoint: string, error: unknown, signal?: AbortSignal): Error {
    if (signal?.aborted || isCancelledError(error)) {
      return new CancelledError(`Request to ${endpoint} was cancelled`);
    }
    console.error('Giving API transport error:', endpoint, error);
    return new NetworkError(`Could not reach ${endpoint}: ${errorMessage(error)}`);
  }

  // Member
  async getProfile(signal?: AbortSignal): Promise<UserProfile> {
    return this.request('/accounts/profile/', parseProfile, { signal });
  }

  async getFinancialSummary(signal?: AbortSignal): Promise<FinancialSummary> {
    return this.request('/dashboard/financial-summary/', parseFinancialSummary, { signal });
  }

  async getGivingHistory({ page, pageSize, signal }: HistoryQuery = {}): Promise<GivingHistory> {
    const queryParams = new URLSearchParams();
    if (page !== undefined) {
      queryParams.append('page', page.toString());
    }
    if (pageSize !== undefined) {
      queryParams.append('page_size', pageSize.toString());
    }

    const query = queryParams.toString();
    const endpoint = `/giving/history/${query ? `?${query}` : ''}`;
    return this.request(endpoint, parseGivingHistory, { signal });
  }

  // Payments
  async createPaymentSession(
    { amount, categoryId, churchId }: PaymentSessionRequest,
    signal?: AbortSignal
  ): Promise<PaymentSession> {
    return this.request('/payments/initialize/', parsePaymentSession, {
      method: 'POST',
      body: {
        amount: amount.toFixed(2),
        category_id: categoryId,
        church_id: churchId,
      },
      signal,
    });
  }

  async checkPaymentStatus(reference: string, signal?: AbortSignal): Promise<PaymentStatusReport> {
    return this.request(`/payments/verify/${encodeURIComponent(reference)}/`, parsePaymentStatus(reference), {
      signal,
    });
  }

  // Reference data
  async getCategories(signal?: AbortSignal): Promise<GivingCategory[]> {
    return this.request('/giving/categories/', parseList(parseCategory, 'category'), { signal });
  }

  async getChurches(signal?: AbortSignal): Promise<Church[]> {
    return this.request('/churches/', parseList(parseChurch, 'church'), { signal });
  }

  async getNotifications(signal?: AbortSignal): Promise<AppNotification[]> {
    return this.request('/notifications/', parseList(parseNotification, 'notification'), { signal });
  }

  // Recurring giving and pledges
  async getRecurringGivings(signal?: AbortSignal): Promise<RecurringGiving[]> {
    return this.request('/giving/recurring/', parseList(parseRecurringGiving, 'recurring giving'), { signal });
  }

  async setRecurringGivingStatus(id: number, status: RecurringGivingStatus): Promise<RecurringGiving> {
    return this.request(`/giving/recurring/${id}/`, parseRecurringGiving, {
      method: 'PATCH',
      body: { status },
    });
  }

  async getPledges(signal?: AbortSignal): Promise<Pledge[]> {
    return this.request('/giving/pledges/', parseList(parsePledge, 'pledge'), { signal });
  }

  async validateToken(): Promise<boolean> {
    try {
      await this.getProfile();
      return true;
    } catch (error) {
      console.warn('Token validation failed:', errorMessage(error));
      return false;
    }
  }
}
