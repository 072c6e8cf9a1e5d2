import { environments, modeForApiKey } from '../../config/environments';
import type {
  BalanceTransaction,
  DayRange,
  GrossConfig,
  RenderContext,
  StripeMode,
} from '../../types/stripe';
import {
  aggregateGrossVolume,
  fetchBalanceTransactions,
  getDayRange,
  getStripeApiKey,
  isGrossVolumeError,
  loadGrossConfig,
  renderError,
  renderGrossVolume,
  type FetchLike,
} from '../../utils';

export interface GrossVolumeDeps {
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
  getApiKey?: (config: GrossConfig) => Promise<string>;
  fetchTransactions?: (
    apiKey: string,
    range: DayRange,
    config: GrossConfig,
  ) => Promise<BalanceTransaction[]>;
  fetchImpl?: FetchLike;
  logError?: (message: string, error: unknown) => void;
}

const renderContext = (
  config: GrossConfig,
  mode: StripeMode,
): RenderContext => ({
  mode,
  dashboardUrl: environments[mode].dashboardUrl,
  locale: config.locale,
  secretService: config.secretService,
  secretType: config.secretType,
});

export const runGrossVolume = async (
  deps: GrossVolumeDeps = {},
): Promise<string> => {
  const config = loadGrossConfig(deps.env);
  const now = deps.now?.() ?? new Date();
  const getApiKey =
    deps.getApiKey ?? ((cfg: GrossConfig) => getStripeApiKey(cfg));
  const fetchTransactions =
    deps.fetchTransactions ??
    ((apiKey: string, range: DayRange, cfg: GrossConfig) =>
      fetchBalanceTransactions(apiKey, range, {
        apiUrl: cfg.apiUrl,
        timeoutMs: cfg.httpTimeoutMs,
        fetchImpl: deps.fetchImpl,
      }));
  const logError =
    deps.logError ??
    ((message: string, error: unknown) => {
      console.error(message, error);
    });

  let mode: StripeMode = 'live';
  try {
    const apiKey = await getApiKey(config);
    mode = modeForApiKey(apiKey);
    const transactions = await fetchTransactions(
      apiKey,
      getDayRange(now),
      config,
    );
    return renderGrossVolume(
      aggregateGrossVolume(transactions),
      now,
      renderContext(config, mode),
    );
  } catch (error) {
    logError(
      isGrossVolumeError(error)
        ? `Gross volume refresh failed (${error.kind})`
        : 'Gross volume refresh failed',
      error,
    );
    return renderError(error, renderContext(config, mode));
  }
};
