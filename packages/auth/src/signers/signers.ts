import type {
  BasicSignature,
  ClientPassword,
  ClientPasswordAuthentication,
  Consumer,
  DisabledSigner,
  NonRefreshableTokenSigner,
  OAuthV1Token,
  Signer,
  TokenSigner,
} from '@authwire/models';

export const disabledSigner: DisabledSigner = { type: 'disabled' };

export function oauthV1Signer(
  consumer: Consumer,
  token?: OAuthV1Token,
  protocolParams?: Readonly<Record<string, string>>,
): BasicSignature {
  return { type: 'oauth1-basic', consumer, token, protocolParams };
}

export function clientPasswordSigner(clientPassword: ClientPassword): ClientPasswordAuthentication {
  return { type: 'client-password', clientPassword };
}

export interface BearerSignerOptions {
  tokenType?: string;
  /** Seconds from `now`; unbounded when omitted */
  expiresIn?: number;
  scopes?: readonly string[];
  now?: number;
}

/**
 * Signer for an access token obtained outside any grant flow, e.g. from a
 * configuration file.
 */
export function bearerSigner(
  accessToken: string,
  options: BearerSignerOptions = {},
): NonRefreshableTokenSigner {
  return {
    type: 'non-refreshable-token',
    accessToken: { value: accessToken },
    tokenType: options.tokenType ?? 'bearer',
    expiresIn: options.expiresIn ?? Number.POSITIVE_INFINITY,
    scope: { values: [...(options.scopes ?? [])] },
    generatedAt: options.now ?? Date.now(),
  };
}

export function isTokenSigner(signer: Signer): signer is TokenSigner {
  return signer.type === 'access-token' || signer.type === 'non-refreshable-token';
}

/**
 * Epoch milliseconds at which the token stops being valid.
 */
export function tokenExpiresAt(signer: TokenSigner): number {
  return signer.generatedAt + signer.expiresIn * 1000;
}

export function isTokenExpired(signer: TokenSigner, now: number = Date.now()): boolean {
  return now >= tokenExpiresAt(signer);
}
