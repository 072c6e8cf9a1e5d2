import type {
  AcceptedTransactionType,
  BalanceTransaction,
  CurrencyTotals,
} from '../types/stripe';
import { normalizeCurrencyCode, toMajorUnits } from './currency';

export const GROSS_VOLUME_TYPES: readonly AcceptedTransactionType[] = [
  'charge',
  'payment',
];

export const isGrossVolumeType = (
  type: string,
): type is AcceptedTransactionType =>
  GROSS_VOLUME_TYPES.some((accepted) => accepted === type);

export const aggregateGrossVolume = (
  transactions: Iterable<BalanceTransaction>,
): CurrencyTotals => {
  const totals: CurrencyTotals = {};
  for (const transaction of transactions) {
    if (!isGrossVolumeType(transaction.type)) {
      continue;
    }
    const code = normalizeCurrencyCode(transaction.currency);
    totals[code] = (totals[code] ?? 0) + transaction.amount;
  }
  return totals;
};

export const sortedCurrencyEntries = (totals: CurrencyTotals) =>
  Object.entries(totals).sort(([left], [right]) => left.localeCompare(right));

export const toMajorTotals = (totals: CurrencyTotals): Record<string, number> =>
  Object.fromEntries(
    sortedCurrencyEntries(totals).map(([code, minor]) => [
      code,
      toMajorUnits(minor, code),
    ]),
  );
