// https://docs.stripe.com/currencies#zero-decimal
export const ZERO_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'BIF',
  'CLP',
  'DJF',
  'GNF',
  'JPY',
  'KMF',
  'KRW',
  'MGA',
  'PYG',
  'RWF',
  'UGX',
  'VND',
  'VUV',
  'XAF',
  'XOF',
  'XPF',
]);

export const THREE_DECIMAL_CURRENCIES: ReadonlySet<string> = new Set([
  'BHD',
  'JOD',
  'KWD',
  'OMR',
  'TND',
]);

export const normalizeCurrencyCode = (currency: string) =>
  currency.trim().toUpperCase();

export const minorUnitDigits = (currency: string) => {
  const code = normalizeCurrencyCode(currency);
  if (ZERO_DECIMAL_CURRENCIES.has(code)) {
    return 0;
  }
  if (THREE_DECIMAL_CURRENCIES.has(code)) {
    return 3;
  }
  return 2;
};

export const toMajorUnits = (amountMinor: number, currency: string) =>
  amountMinor / 10 ** minorUnitDigits(currency);

export function formatAmount(
  amountMinor: number,
  currency: string,
  locale = 'en-US',
) {
  const code = normalizeCurrencyCode(currency);
  const digits = minorUnitDigits(code);
  const amount = toMajorUnits(amountMinor, code);
  try {
    return new Intl.NumberFormat(locale, {
      style: 'currency',
      currency: code,
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    }).format(amount);
  } catch (err) {
    if (err instanceof RangeError) {
      return `${amount.toFixed(digits)} ${code}`;
    }
    throw err;
  }
}
