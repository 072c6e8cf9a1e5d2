import { environments } from '../config/environments';
import type { CurrencyTotals, RenderContext } from '../types/stripe';
import { sortedCurrencyEntries } from './aggregate';
import { formatAmount } from './currency';
import { formatDisplayDate, formatDisplayTime } from './day-range';
import {
  AuthenticationFailureError,
  CredentialUnavailableError,
  MalformedResponseError,
  NetworkFailureError,
  errorMessage,
} from './errors';

export const SEPARATOR = '---';
export const TOP_ICON = '\u{1F4B0}';
export const WARNING_ICON = '⚠';
export const EMPTY_TOP_AMOUNT = '0.00';
export const NO_TRANSACTIONS_LINE = 'No transactions today';
const TOP_JOINER = ' · ';
const MONOSPACE = 'font=monospace size=10';

/** Argos reads everything after `|` as attributes. */
export const sanitizeText = (value: string) =>
  value.replace(/\s*[\r\n]+\s*/g, ' ').replace(/\|/g, '¦').trim();

const withAttributes = (text: string, attributes?: string) =>
  attributes ? `${text} | ${attributes}` : text;

const modeSuffix = (context: RenderContext) => {
  const label = environments[context.mode].label;
  return label ? ` (${label})` : '';
};

const footerLines = (context: RenderContext) => [
  SEPARATOR,
  withAttributes('Open Stripe Dashboard', `href=${context.dashboardUrl}`),
  withAttributes('Refresh', 'refresh=true'),
];

export const renderGrossVolume = (
  totals: CurrencyTotals,
  now: Date,
  context: RenderContext,
): string => {
  const entries = sortedCurrencyEntries(totals);
  const formatted = entries.map(([code, minor]) =>
    formatAmount(minor, code, context.locale),
  );

  const topAmount = formatted.length
    ? formatted.join(TOP_JOINER)
    : EMPTY_TOP_AMOUNT;
  const details = formatted.length
    ? formatted.map((amount) => withAttributes(`  ${amount}`, 'size=11'))
    : [NO_TRANSACTIONS_LINE];

  return [
    `${TOP_ICON} ${topAmount}${modeSuffix(context)}`,
    SEPARATOR,
    withAttributes(`Gross Volume ${formatDisplayDate(now)}`, 'size=12'),
    ...details,
    withAttributes(`Updated ${formatDisplayTime(now)}`, 'size=10'),
    ...footerLines(context),
  ].join('\n');
};

const errorDetailLines = (error: unknown, context: RenderContext) => {
  if (error instanceof CredentialUnavailableError) {
    const lines = [sanitizeText(error.message)];
    if (error.reason === 'missing') {
      const service = sanitizeText(context.secretService);
      const type = sanitizeText(context.secretType);
      lines.push(
        withAttributes('Run in terminal:', MONOSPACE),
        withAttributes(
          `secret-tool store --label='Stripe API Key' service ${service} type ${type}`,
          MONOSPACE,
        ),
      );
    } else if (error.reason === 'tool-missing') {
      lines.push(
        withAttributes('Install libsecret-tools to read the key', MONOSPACE),
      );
    } else if (error.reason === 'locked') {
      lines.push('Unlock the keyring and refresh');
    }
    return lines;
  }
  if (error instanceof AuthenticationFailureError) {
    return [
      sanitizeText(`HTTP Error ${error.status}: ${error.message}`),
      'Check the Stripe API key',
    ];
  }
  if (error instanceof NetworkFailureError) {
    return [sanitizeText(`Network error: ${error.message}`)];
  }
  if (error instanceof MalformedResponseError) {
    return [sanitizeText(`Unexpected response: ${error.message}`)];
  }
  return [`Error: ${sanitizeText(errorMessage(error))}`];
};

export const renderError = (
  error: unknown,
  context: RenderContext,
): string =>
  [
    `${WARNING_ICON} Stripe`,
    SEPARATOR,
    ...errorDetailLines(error, context),
    ...footerLines(context),
  ].join('\n');
