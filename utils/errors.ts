export type GrossVolumeErrorKind =
  | 'credential-unavailable'
  | 'network-failure'
  | 'authentication-failure'
  | 'malformed-response';

export type CredentialFailureReason =
  | 'missing'
  | 'locked'
  | 'tool-missing'
  | 'lookup-failed';

export abstract class GrossVolumeError extends Error {
  abstract readonly kind: GrossVolumeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CredentialUnavailableError extends GrossVolumeError {
  readonly kind = 'credential-unavailable';

  constructor(
    readonly reason: CredentialFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class NetworkFailureError extends GrossVolumeError {
  readonly kind = 'network-failure';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AuthenticationFailureError extends GrossVolumeError {
  readonly kind = 'authentication-failure';

  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

export class MalformedResponseError extends GrossVolumeError {
  readonly kind = 'malformed-response';
}

export const isGrossVolumeError = (
  error: unknown,
): error is GrossVolumeError => error instanceof GrossVolumeError;

export const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);
