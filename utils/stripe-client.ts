import type {
  AcceptedTransactionType,
  BalanceTransaction,
  BalanceTransactionPage,
  DayRange,
} from '../types/stripe';
import { GROSS_VOLUME_TYPES } from './aggregate';
import {
  AuthenticationFailureError,
  MalformedResponseError,
  NetworkFailureError,
  errorMessage,
} from './errors';
import { DEFAULT_API_URL, DEFAULT_HTTP_TIMEOUT_MS } from './stripe-config';

export const PAGE_LIMIT = 100;
const BALANCE_TRANSACTIONS_PATH = '/v1/balance_transactions';

export type FetchLike = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

export interface FetchTransactionsOptions {
  apiUrl?: string;
  timeoutMs?: number;
  types?: readonly AcceptedTransactionType[];
  fetchImpl?: FetchLike;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isTimeout = (error: unknown) =>
  isRecord(error) &&
  (error.name === 'TimeoutError' || error.name === 'AbortError');

const toTransaction = (item: unknown): BalanceTransaction => {
  if (
    !isRecord(item) ||
    typeof item.id !== 'string' ||
    typeof item.amount !== 'number' ||
    !Number.isInteger(item.amount) ||
    typeof item.currency !== 'string' ||
    typeof item.type !== 'string' ||
    typeof item.created !== 'number'
  ) {
    throw new MalformedResponseError(
      'Unexpected balance transaction in Stripe response',
    );
  }
  return {
    id: item.id,
    amount: item.amount,
    currency: item.currency,
    type: item.type,
    created: item.created,
  };
};

export const parseBalanceTransactionPage = (
  payload: unknown,
): BalanceTransactionPage => {
  if (
    !isRecord(payload) ||
    !Array.isArray(payload.data) ||
    typeof payload.has_more !== 'boolean'
  ) {
    throw new MalformedResponseError('Stripe response is not a list page');
  }
  return {
    data: payload.data.map(toTransaction),
    hasMore: payload.has_more,
  };
};

const stripeErrorMessage = async (response: Response) => {
  try {
    const body: unknown = await response.json();
    if (
      isRecord(body) &&
      isRecord(body.error) &&
      typeof body.error.message === 'string'
    ) {
      return body.error.message;
    }
  } catch {
    return response.statusText;
  }
  return response.statusText;
};

export const buildPageUrl = (
  apiUrl: string,
  range: DayRange,
  type: AcceptedTransactionType,
  startingAfter?: string,
) => {
  const url = new URL(`${apiUrl}${BALANCE_TRANSACTIONS_PATH}`);
  url.searchParams.set('created[gte]', String(range.gte));
  url.searchParams.set('created[lte]', String(range.lte));
  url.searchParams.set('type', type);
  url.searchParams.set('limit', String(PAGE_LIMIT));
  if (startingAfter) {
    url.searchParams.set('starting_after', startingAfter);
  }
  return url;
};

export async function fetchBalanceTransactionPage(
  apiKey: string,
  url: URL,
  options: Pick<FetchTransactionsOptions, 'timeoutMs' | 'fetchImpl'> = {},
): Promise<BalanceTransactionPage> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers: { Authorization: `Bearer ${apiKey}` },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (isTimeout(err)) {
      throw new NetworkFailureError(
        `Stripe did not respond within ${Math.round(timeoutMs / 1000)}s`,
        undefined,
        { cause: err },
      );
    }
    throw new NetworkFailureError(errorMessage(err), undefined, {
      cause: err,
    });
  }

  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationFailureError(
      response.status,
      await stripeErrorMessage(response),
    );
  }
  if (!response.ok) {
    throw new NetworkFailureError(
      `HTTP Error ${response.status}: ${response.statusText}`,
      response.status,
    );
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (err) {
    if (isTimeout(err)) {
      throw new NetworkFailureError('Stripe response timed out', undefined, {
        cause: err,
      });
    }
    throw new MalformedResponseError('Stripe response is not valid JSON', {
      cause: err,
    });
  }
  return parseBalanceTransactionPage(payload);
}

export async function fetchBalanceTransactions(
  apiKey: string,
  range: DayRange,
  options: FetchTransactionsOptions = {},
): Promise<BalanceTransaction[]> {
  const apiUrl = options.apiUrl ?? DEFAULT_API_URL;
  const types = options.types ?? GROSS_VOLUME_TYPES;
  const seen = new Set<string>();
  const transactions: BalanceTransaction[] = [];

  for (const type of types) {
    let startingAfter: string | undefined;
    for (;;) {
      const page = await fetchBalanceTransactionPage(
        apiKey,
        buildPageUrl(apiUrl, range, type, startingAfter),
        options,
      );

      for (const transaction of page.data) {
        if (seen.has(transaction.id)) {
          continue;
        }
        seen.add(transaction.id);
        transactions.push(transaction);
      }

      if (!page.hasMore) {
        break;
      }
      const last = page.data.at(-1);
      if (!last) {
        throw new MalformedResponseError(
          'Stripe reported more pages but returned an empty page',
        );
      }
      if (last.id === startingAfter) {
        throw new MalformedResponseError(
          `Stripe pagination cursor did not advance past ${last.id}`,
        );
      }
      startingAfter = last.id;
    }
  }

  return transactions;
}
