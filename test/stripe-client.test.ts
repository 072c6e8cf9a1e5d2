import { aggregateGrossVolume } from '../utils/aggregate';
import {
  AuthenticationFailureError,
  MalformedResponseError,
  NetworkFailureError,
} from '../utils/errors';
import {
  fetchBalanceTransactions,
  type FetchLike,
} from '../utils/stripe-client';
import type { BalanceTransaction } from '../types/stripe';

const RANGE = { gte: 1_790_000_000, lte: 1_790_050_000 };
const API_KEY = 'sk_test_placeholder';

const jsonResponse = (body: unknown, status = 200, statusText = 'OK') =>
  new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });

const makeTransaction = (
  id: string,
  amount: number,
  currency = 'usd',
  type = 'charge',
): BalanceTransaction => ({
  id,
  amount,
  currency,
  type,
  created: RANGE.gte + 60,
});

const chunk = <T>(items: T[], size: number) => {
  const pages: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    pages.push(items.slice(index, index + size));
  }
  return pages.length ? pages : [[]];
};

/** Serves each type's pages in order, keyed by the `starting_after` cursor. */
const pagedFetch = (pagesByType: Record<string, BalanceTransaction[][]>) => {
  const calls: { url: URL; init?: RequestInit }[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(String(input));
    calls.push({ url, init });
    const pages = pagesByType[url.searchParams.get('type') ?? ''] ?? [[]];
    const after = url.searchParams.get('starting_after');
    const index = after
      ? pages.findIndex((page) => page.at(-1)?.id === after) + 1
      : 0;
    return jsonResponse({
      object: 'list',
      data: pages[index],
      has_more: index < pages.length - 1,
    });
  };
  return { fetchImpl, calls };
};

const captureError = async (promise: Promise<unknown>) => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
};

describe('balance transaction fetcher', () => {
  const charges = [
    makeTransaction('txn_1', 1050),
    makeTransaction('txn_2', 2200),
    makeTransaction('txn_3', 700, 'eur'),
    makeTransaction('txn_4', 300),
    makeTransaction('txn_5', 5000, 'jpy'),
  ];
  const payments = [
    makeTransaction('txn_6', 400, 'eur', 'payment'),
    makeTransaction('txn_7', 125, 'usd', 'payment'),
  ];

  it('gives the same totals for one page or many', async () => {
    const single = pagedFetch({ charge: [charges], payment: [payments] });
    const paged = pagedFetch({
      charge: chunk(charges, 2),
      payment: chunk(payments, 1),
    });

    const singleTotals = aggregateGrossVolume(
      await fetchBalanceTransactions(API_KEY, RANGE, {
        fetchImpl: single.fetchImpl,
      }),
    );
    const pagedTotals = aggregateGrossVolume(
      await fetchBalanceTransactions(API_KEY, RANGE, {
        fetchImpl: paged.fetchImpl,
      }),
    );

    expect(pagedTotals).toEqual(singleTotals);
    expect(pagedTotals).toEqual({ EUR: 1100, JPY: 5000, USD: 3675 });
    expect(single.calls).toHaveLength(2);
    expect(paged.calls).toHaveLength(5);
  });

  it('sends the date range, type filter, page size and cursor', async () => {
    const { fetchImpl, calls } = pagedFetch({
      charge: chunk(charges, 3),
      payment: [[]],
    });

    await fetchBalanceTransactions(API_KEY, RANGE, {
      apiUrl: 'http://localhost:12111',
      fetchImpl,
    });

    const [first, second, third] = calls;
    expect(first.url.origin).toBe('http://localhost:12111');
    expect(first.url.pathname).toBe('/v1/balance_transactions');
    expect(first.url.searchParams.get('created[gte]')).toBe('1790000000');
    expect(first.url.searchParams.get('created[lte]')).toBe('1790050000');
    expect(first.url.searchParams.get('type')).toBe('charge');
    expect(first.url.searchParams.get('limit')).toBe('100');
    expect(first.url.searchParams.has('starting_after')).toBe(false);
    expect(new Headers(first.init?.headers).get('Authorization')).toBe(
      `Bearer ${API_KEY}`,
    );
    expect(second.url.searchParams.get('starting_after')).toBe('txn_3');
    expect(third.url.searchParams.get('type')).toBe('payment');
    expect(third.url.searchParams.has('starting_after')).toBe(false);
  });

  it('does not count a transaction twice when pages overlap', async () => {
    const { fetchImpl } = pagedFetch({
      charge: [
        [makeTransaction('txn_a', 100), makeTransaction('txn_b', 200)],
        [makeTransaction('txn_b', 200), makeTransaction('txn_c', 300)],
      ],
    });

    const transactions = await fetchBalanceTransactions(API_KEY, RANGE, {
      fetchImpl,
      types: ['charge'],
    });

    expect(transactions.map((transaction) => transaction.id)).toEqual([
      'txn_a',
      'txn_b',
      'txn_c',
    ]);
  });

  it('maps 401 to an auth failure with the Stripe message', async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse(
        {
          error: {
            message: 'Invalid API Key provided',
            type: 'invalid_request_error',
          },
        },
        401,
        'Unauthorized',
      );

    const error = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    );

    expect(error).toBeInstanceOf(AuthenticationFailureError);
    expect(error).toHaveProperty('status', 401);
    expect(error).toHaveProperty('message', 'Invalid API Key provided');
  });

  it('maps 403 to an authentication failure', async () => {
    const fetchImpl: FetchLike = async () =>
      new Response('forbidden', { status: 403, statusText: 'Forbidden' });

    const error = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    );

    expect(error).toBeInstanceOf(AuthenticationFailureError);
    expect(error).toHaveProperty('status', 403);
    expect(error).toHaveProperty('message', 'Forbidden');
  });

  it('maps server errors to a network failure', async () => {
    const fetchImpl: FetchLike = async () =>
      new Response('upstream unavailable', {
        status: 503,
        statusText: 'Service Unavailable',
      });

    const error = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    );

    expect(error).toBeInstanceOf(NetworkFailureError);
    expect(error).toHaveProperty('status', 503);
    expect(error).toHaveProperty(
      'message',
      'HTTP Error 503: Service Unavailable',
    );
  });

  it('maps transport errors and timeouts to a network failure', async () => {
    const refused: FetchLike = async () => {
      throw new TypeError('fetch failed');
    };
    const timedOut: FetchLike = async () => {
      throw Object.assign(new Error('The operation was aborted'), {
        name: 'TimeoutError',
      });
    };

    const refusedError = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl: refused }),
    );
    const timeoutError = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, {
        fetchImpl: timedOut,
        timeoutMs: 15000,
      }),
    );

    expect(refusedError).toBeInstanceOf(NetworkFailureError);
    expect(refusedError).toHaveProperty('message', 'fetch failed');
    expect(timeoutError).toBeInstanceOf(NetworkFailureError);
    expect(timeoutError).toHaveProperty(
      'message',
      'Stripe did not respond within 15s',
    );
  });

  it('rejects bodies that are not JSON', async () => {
    const fetchImpl: FetchLike = async () =>
      new Response('<html>maintenance</html>', { status: 200 });

    const error = await captureError(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    );

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error).toHaveProperty(
      'message',
      'Stripe response is not valid JSON',
    );
  });

  it('rejects pages with invalid items', async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({
        data: [
          {
            id: 'txn_1',
            amount: '10.50',
            currency: 'usd',
            type: 'charge',
            created: 1,
          },
        ],
        has_more: false,
      });

    await expect(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    ).rejects.toBeInstanceOf(MalformedResponseError);
  });

  it('rejects an empty page that claims more results', async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({ data: [], has_more: true });

    await expect(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    ).rejects.toThrow('Stripe reported more pages but returned an empty page');
  });

  it('stops when the cursor does not advance', async () => {
    const fetchImpl: FetchLike = async () =>
      jsonResponse({
        data: [makeTransaction('txn_loop', 100)],
        has_more: true,
      });

    await expect(
      fetchBalanceTransactions(API_KEY, RANGE, { fetchImpl }),
    ).rejects.toThrow('Stripe pagination cursor did not advance past txn_loop');
  });
});
