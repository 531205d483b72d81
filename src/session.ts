/**
 * Bearer-token lifecycle for the remote API
 */

import type { ApiClient, CredentialProvider, CredentialRequest } from './interfaces';
import type { Credentials } from './types';
import { SESSION_STATE } from './enums';
import { AuthenticationError, TransportError, describeError } from './errors';
import { errorFields, logger as defaultLogger, type Logger } from './logger';
import { now } from './utils';

export const DEFAULT_TOKEN_LIFETIME_MS = 55 * 60_000;

export interface SessionManagerConfig {
  api: ApiClient;
  credentialProvider: CredentialProvider;
  tokenLifetimeMs?: number; // Estimated validity, kept below the real lifetime
  clock?: () => number;
  logger?: Logger;
  onStateChange?: (state: SESSION_STATE) => void;
}

/**
 * Keeps a token valid, asking for credentials when it cannot renew silently.
 *
 * NO_SESSION -> AWAITING_CREDENTIALS -> AUTHENTICATED -> EXPIRED -> AWAITING_CREDENTIALS
 */
export class SessionManager {
  private token: string | null = null;
  private expiresAt = 0;
  private credentials: Credentials | null = null;
  private currentState = SESSION_STATE.NO_SESSION;

  private readonly tokenLifetimeMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(private readonly config: SessionManagerConfig) {
    this.tokenLifetimeMs = config.tokenLifetimeMs ?? DEFAULT_TOKEN_LIFETIME_MS;
    this.clock = config.clock ?? now;
    this.logger = config.logger ?? defaultLogger;
  }

  get state(): SESSION_STATE {
    if (this.currentState === SESSION_STATE.AUTHENTICATED && !this.isValid()) {
      return SESSION_STATE.EXPIRED;
    }
    return this.currentState;
  }

  getExpiresAt(): number | null {
    return this.token ? this.expiresAt : null;
  }

  hasCachedCredentials(): boolean {
    return this.credentials !== null;
  }

  /**
   * Return a valid token, logging in again when needed.
   * Resolves null when the credential prompt is cancelled.
   */
  async ensure(): Promise<string | null> {
    if (this.token && this.isValid()) {
      return this.token;
    }

    if (this.token) {
      this.setState(SESSION_STATE.EXPIRED);
      this.token = null;
    }

    try {
      return await this.authenticate();
    } catch (error) {
      this.setState(SESSION_STATE.NO_SESSION);
      throw error;
    }
  }

  private async authenticate(): Promise<string | null> {
    let attempt = 0;
    let lastError: string | undefined;

    for (;;) {
      let credentials = this.credentials;

      if (!credentials) {
        attempt++;
        this.setState(SESSION_STATE.AWAITING_CREDENTIALS);
        const request: CredentialRequest =
          lastError === undefined
            ? { attempt, reason: 'missing' }
            : { attempt, reason: 'rejected', error: lastError };

        credentials = await this.config.credentialProvider.requestCredentials(request);
        if (!credentials) {
          this.logger.info('Credential prompt cancelled');
          this.setState(SESSION_STATE.NO_SESSION);
          return null;
        }
      }

      try {
        const token = await this.config.api.login(credentials);
        this.credentials = credentials;
        this.token = token;
        this.expiresAt = this.clock() + this.tokenLifetimeMs;
        this.logger.info('Logged in to the API', { username: credentials.username });
        this.setState(SESSION_STATE.AUTHENTICATED);
        return token;
      } catch (error) {
        if (!(error instanceof AuthenticationError || error instanceof TransportError)) {
          throw error;
        }
        this.logger.warn('API login failed', { username: credentials.username, error: errorFields(error) });
        this.credentials = null;
        lastError = describeError(error);
      }
    }
  }

  /**
   * Forget the token and the cached credentials
   */
  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
    this.credentials = null;
    this.setState(SESSION_STATE.NO_SESSION);
  }

  private isValid(): boolean {
    return this.clock() < this.expiresAt;
  }

  private setState(state: SESSION_STATE): void {
    if (state === this.currentState) return;
    this.currentState = state;
    this.config.onStateChange?.(state);
  }
}
