import { execFile } from 'child_process';
import {
  GetSecretValueCommand,
  SecretsManagerClient,
} from '@aws-sdk/client-secrets-manager';
import type { GrossConfig } from '../types/stripe';
import { CredentialUnavailableError, errorMessage } from './errors';
import { SECRET_TOOL_COMMAND } from './stripe-config';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Resolves for any exit status; rejects only when the command cannot be
 * spawned.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
  timeoutMs: number,
) => Promise<CommandResult>;

/** Returns the raw secret: plain text or JSON holding `STRIPE_API_KEY`. */
export type SecretFetcher = (secretId: string) => Promise<string | undefined>;

export interface CredentialDeps {
  runCommand?: CommandRunner;
  fetchSecret?: SecretFetcher;
}

const LOCKED_PATTERN = /locked|dismissed|prompt/i;

let secretsClient: SecretsManagerClient | null = null;

export const runCommand: CommandRunner = (command, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      [...args],
      { timeout: timeoutMs, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr, timedOut: false });
          return;
        }
        if (typeof error.code === 'string') {
          reject(error);
          return;
        }
        resolve({
          exitCode: typeof error.code === 'number' ? error.code : null,
          stdout,
          stderr,
          timedOut: error.killed === true,
        });
      },
    );
  });

const readSecretValue = (raw: string | undefined) => {
  if (!raw) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return raw; // plain-text secret
  }
  if (typeof parsed !== 'object' || parsed === null) {
    return raw;
  }
  return 'STRIPE_API_KEY' in parsed &&
    typeof parsed.STRIPE_API_KEY === 'string'
    ? parsed.STRIPE_API_KEY
    : undefined;
};

export const fetchSecretsManagerValue: SecretFetcher = async (secretId) => {
  secretsClient ??= new SecretsManagerClient({});
  const response = await secretsClient.send(
    new GetSecretValueCommand({ SecretId: secretId }),
  );
  return (
    response.SecretString ??
    (response.SecretBinary
      ? Buffer.from(response.SecretBinary).toString('utf-8')
      : undefined)
  );
};

const spawnErrorCode = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error
    ? error.code
    : undefined;

export const lookupKeyringSecret = async (
  config: Pick<
    GrossConfig,
    'secretService' | 'secretType' | 'secretTimeoutMs'
  >,
  run: CommandRunner = runCommand,
): Promise<string> => {
  const args = [
    'lookup',
    'service',
    config.secretService,
    'type',
    config.secretType,
  ];

  let result: CommandResult;
  try {
    result = await run(SECRET_TOOL_COMMAND, args, config.secretTimeoutMs);
  } catch (err) {
    const code = spawnErrorCode(err);
    if (code === 'ENOENT' || code === 'EACCES') {
      throw new CredentialUnavailableError(
        'tool-missing',
        `${SECRET_TOOL_COMMAND} is not installed`,
        { cause: err },
      );
    }
    throw new CredentialUnavailableError(
      'lookup-failed',
      `Could not run ${SECRET_TOOL_COMMAND}: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  const key = result.stdout.trim();
  if (result.exitCode === 0 && key && !result.timedOut) {
    return key;
  }

  const stderr = result.stderr.trim();
  if (result.timedOut || LOCKED_PATTERN.test(stderr)) {
    throw new CredentialUnavailableError('locked', 'GNOME Keyring is locked');
  }
  if (result.exitCode === 0 || !stderr) {
    throw new CredentialUnavailableError(
      'missing',
      'No API key in GNOME Keyring',
    );
  }
  throw new CredentialUnavailableError(
    'lookup-failed',
    `${SECRET_TOOL_COMMAND} failed: ${stderr}`,
  );
};

export const getStripeApiKey = async (
  config: GrossConfig,
  deps: CredentialDeps = {},
): Promise<string> => {
  if (config.apiKeyOverride) {
    return config.apiKeyOverride;
  }

  if (config.secretArn) {
    const fetchSecret = deps.fetchSecret ?? fetchSecretsManagerValue;
    let value: string | undefined;
    try {
      value = readSecretValue(await fetchSecret(config.secretArn))?.trim();
    } catch (err) {
      throw new CredentialUnavailableError(
        'lookup-failed',
        `Secrets Manager lookup failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    if (!value) {
      throw new CredentialUnavailableError(
        'missing',
        'Stripe API key secret is empty',
      );
    }
    return value;
  }

  return lookupKeyringSecret(config, deps.runCommand);
};
