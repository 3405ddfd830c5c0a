import type { StoreApi } from 'zustand/vanilla';
import { logger } from '../../../utils/logging/logger';
import {
  SETTINGS_KEYS,
  TOKEN_REFRESH_LEAD_SECONDS,
  VALIDATION_MESSAGES
} from '../../config/constants';
import { AuthError, FetchError, createErrorDetails, isCancellation, toError } from '../../errors/types';
import type { CoreEventBus } from '../../events/event-bus';
import type { SettingsStore } from '../../settings/settings-store';
import type { RequestGateway } from '../api/request-gateway';
import { tokenSelectors, TokenStore } from '../../../store/session/tokenStore';
import type { Role, Session } from '../../../types/mining';
import {
  firstIssueMessage,
  refreshResponseSchema,
  signInResponseSchema,
  signInSchema
} from '../../../utils/validation/auth';
import { decodeAccessToken } from './token-decoder';

const SOURCE = 'SessionController';

// setTimeout stores its delay as a signed 32-bit integer
const MAX_TIMER_DELAY_MS = 2147483647;

export type SessionStatus = 'LoggedOut' | 'LoggedIn';

export interface SessionControllerConfig {
  tokenStore: StoreApi<TokenStore>;
  gateway: RequestGateway;
  settings: SettingsStore;
  events: CoreEventBus;
  authUrl: string;
  refreshUrl: string;
  refreshLeadSeconds?: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

interface IssuedTokens {
  accessToken: string;
  refreshToken?: string;
  lastIdentity?: string;
}

/**
 * Owns the authentication state machine: LoggedOut -> LoggedIn -> LoggedOut.
 * Every path out of LoggedIn (user logout, detected expiry, failed refresh) goes through logout().
 */
export class SessionController {
  private readonly tokenStore: StoreApi<TokenStore>;
  private readonly gateway: RequestGateway;
  private readonly settings: SettingsStore;
  private readonly events: CoreEventBus;
  private readonly authUrl: string;
  private readonly refreshUrl: string;
  private readonly refreshLeadSeconds: number;
  private readonly now: () => number;
  private refreshTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(config: SessionControllerConfig) {
    this.tokenStore = config.tokenStore;
    this.gateway = config.gateway;
    this.settings = config.settings;
    this.events = config.events;
    this.authUrl = config.authUrl;
    this.refreshUrl = config.refreshUrl;
    this.refreshLeadSeconds = config.refreshLeadSeconds ?? TOKEN_REFRESH_LEAD_SECONDS;
    this.now = config.now ?? Date.now;
  }

  getStatus(): SessionStatus {
    return this.isAuthenticated() ? 'LoggedIn' : 'LoggedOut';
  }

  getSession(): Session {
    return { ...this.tokenStore.getState().session };
  }

  getRole(): Role | undefined {
    return tokenSelectors.getRole(this.tokenStore.getState());
  }

  getAccessToken(): string | undefined {
    return this.tokenStore.getState().session.accessToken;
  }

  isAuthenticated(): boolean {
    return tokenSelectors.isValidAt(this.tokenStore.getState(), this.nowSeconds());
  }

  hasRefreshTimer(): boolean {
    return this.refreshTimer !== null;
  }

  async login(identity: string, credential: string): Promise<Session> {
    const input = signInSchema.safeParse({ email: identity, password: credential });
    if (!input.success) {
      const error = new AuthError('InvalidCredential', VALIDATION_MESSAGES.invalidCredentials, input.error, {
        reason: firstIssueMessage(input.error)
      });
      this.events.emit('loginFailed', { message: error.message });
      throw error;
    }

    await logger.info('Login starting', { identity: input.data.email }, { source: SOURCE });

    let response;
    try {
      response = await this.gateway.dispatch({
        method: 'POST',
        url: this.authUrl,
        data: { email: input.data.email, password: input.data.password, returnSecureToken: true },
        schema: signInResponseSchema
      }, { requiresAuth: false, kind: 'auth' }).response;
    } catch (error) {
      if (isCancellation(error)) {
        throw error;
      }
      const authError = this.toAuthError(error);
      await logger.warn('Login failed', { kind: authError.kind, message: authError.message }, { source: SOURCE });
      this.events.emit('loginFailed', { message: authError.message });
      throw authError;
    }

    try {
      const session = this.establish({
        accessToken: response.idToken,
        refreshToken: response.refreshToken,
        lastIdentity: input.data.email
      });
      await logger.info('Login successful', { role: session.role, expiresAt: session.expiresAt }, { source: SOURCE });
      return session;
    } catch (error) {
      const authError = error instanceof AuthError
        ? error
        : new AuthError('MalformedToken', 'Could not read the issued token', toError(error), createErrorDetails(error));
      await logger.warn('Login failed', { kind: authError.kind, message: authError.message }, { source: SOURCE });
      this.events.emit('loginFailed', { message: authError.message });
      throw authError;
    }
  }

  /**
   * Idempotent and total. Each step runs even if an earlier one throws.
   */
  logout(): void {
    const hadSession = tokenSelectors.hasToken(this.tokenStore.getState());

    this.runStep('clear token store', () => this.tokenStore.getState().clear());
    this.runStep('stop refresh timer', () => this.stopRefreshTimer());
    this.runStep('cancel in-flight requests', () => this.gateway.cancelAll());
    this.runStep('remove persisted keys', () => {
      Object.values(SETTINGS_KEYS).forEach(key => this.settings.remove(key));
    });

    if (hadSession) {
      void logger.info('Logout complete', undefined, { source: SOURCE });
    }
    this.events.emit('sessionChanged', { isAuthenticated: false });
    this.events.emit('logoutCompleted', {});
  }

  /**
   * Called whenever the dialog is shown or focused. Returns whether a logout happened.
   */
  validateAndLogoutIfExpired(): boolean {
    const state = this.tokenStore.getState();
    if (!tokenSelectors.hasToken(state) || this.isAuthenticated()) {
      return false;
    }

    void logger.info('Session expired', { expiresAt: state.session.expiresAt }, { source: SOURCE });
    this.logout();
    this.events.emit('sessionExpired', { message: VALIDATION_MESSAGES.sessionExpired });
    return true;
  }

  /**
   * The server refused the token. Ends the session through the expiry path
   * even when the local clock still considers it valid.
   */
  endRejectedSession(): void {
    if (this.validateAndLogoutIfExpired()) {
      return;
    }
    const state = this.tokenStore.getState();
    if (!tokenSelectors.hasToken(state)) {
      return;
    }

    void logger.warn('Session rejected by server', { expiresAt: state.session.expiresAt }, { source: SOURCE });
    this.logout();
    this.events.emit('sessionExpired', { message: VALIDATION_MESSAGES.sessionExpired });
  }

  /**
   * Clears any leftover session before the login surface is shown
   */
  handleLoginRequired(): void {
    this.logout();
    this.events.emit('loginRequired', {});
  }

  /**
   * Exchanges the refresh token for a new access token. Any failure ends the session.
   * Resolves to whether the session is still alive; never rejects.
   */
  async refresh(): Promise<boolean> {
    const refreshToken = this.tokenStore.getState().session.refreshToken
      ?? this.settings.get(SETTINGS_KEYS.refreshToken);

    if (!refreshToken) {
      await logger.warn('Token refresh aborted: no refresh token available', undefined, { source: SOURCE });
      this.logout();
      return false;
    }

    try {
      const response = await this.gateway.dispatch({
        method: 'POST',
        url: this.refreshUrl,
        data: { grant_type: 'refresh_token', refresh_token: refreshToken },
        schema: refreshResponseSchema
      }, { requiresAuth: false, kind: 'auth' }).response;

      const accessToken = response.access_token ?? response.id_token;
      if (!accessToken) {
        throw new AuthError('MalformedToken', 'Refresh response carries no token');
      }

      const session = this.establish({
        accessToken,
        refreshToken: response.refresh_token ?? refreshToken,
        lastIdentity: this.tokenStore.getState().session.lastIdentity
          ?? this.settings.get(SETTINGS_KEYS.lastIdentity)
      });
      await logger.info('Token refresh succeeded', { expiresAt: session.expiresAt }, { source: SOURCE });
      return true;
    } catch (error) {
      if (isCancellation(error)) {
        // A logout cancelled the refresh; the session is already gone
        return false;
      }
      const message = toError(error).message;
      await logger.error('Token refresh failed', { message }, { source: SOURCE });
      this.logout();
      this.events.emit('loginFailed', { message: `Token refresh failed: ${message}` });
      return false;
    }
  }

  /**
   * Reinstates a persisted session at startup: a live access token is reused,
   * an expired one is refreshed, anything else stays logged out.
   */
  async restore(): Promise<boolean> {
    const accessToken = this.settings.get(SETTINGS_KEYS.accessToken);
    const refreshToken = this.settings.get(SETTINGS_KEYS.refreshToken);
    const lastIdentity = this.settings.get(SETTINGS_KEYS.lastIdentity);

    if (accessToken) {
      try {
        const decoded = decodeAccessToken(accessToken);
        if (this.nowSeconds() < decoded.expiresAt) {
          const session = this.establish({ accessToken, refreshToken, lastIdentity });
          await logger.info('Session restored', { role: session.role }, { source: SOURCE });
          return true;
        }
      } catch (error) {
        await logger.warn('Persisted token unreadable', createErrorDetails(error), { source: SOURCE });
      }
    }

    if (refreshToken) {
      return this.refresh();
    }

    if (lastIdentity) {
      this.tokenStore.getState().setLastIdentity(lastIdentity);
    }
    return false;
  }

  dispose(): void {
    this.stopRefreshTimer();
  }

  private establish(tokens: IssuedTokens): Session {
    const decoded = decodeAccessToken(tokens.accessToken);
    if (decoded.expiresAt <= this.nowSeconds()) {
      throw new AuthError('MalformedToken', 'Issued token is already expired', undefined, { expiresAt: decoded.expiresAt });
    }

    this.tokenStore.getState().set({
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: decoded.expiresAt,
      role: decoded.role,
      lastIdentity: tokens.lastIdentity ?? decoded.email
    });
    this.persist();
    this.scheduleRefresh(decoded.expiresAt);

    this.events.emit('sessionChanged', { isAuthenticated: true, role: decoded.role });
    return this.getSession();
  }

  private persist(): void {
    const { session } = this.tokenStore.getState();
    const entries: Array<[string, string | undefined]> = [
      [SETTINGS_KEYS.accessToken, session.accessToken],
      [SETTINGS_KEYS.refreshToken, session.refreshToken],
      [SETTINGS_KEYS.expiresAt, session.expiresAt > 0 ? String(session.expiresAt) : undefined],
      [SETTINGS_KEYS.lastIdentity, session.lastIdentity]
    ];
    for (const [key, value] of entries) {
      if (value === undefined) {
        this.settings.remove(key);
      } else {
        this.settings.set(key, value);
      }
    }
  }

  private scheduleRefresh(expiresAt: number): void {
    this.stopRefreshTimer();
    const remainingSeconds = expiresAt - this.nowSeconds();
    // Short-lived tokens refresh halfway through their life instead of immediately
    const leadSeconds = Math.min(this.refreshLeadSeconds, remainingSeconds / 2);
    const delayMs = Math.min(MAX_TIMER_DELAY_MS, (remainingSeconds - leadSeconds) * 1000);
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      void this.refresh();
    }, delayMs);
    this.refreshTimer.unref?.();
  }

  private stopRefreshTimer(): void {
    if (this.refreshTimer !== null) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  private runStep(step: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      void logger.error('Logout step failed', { step, message: toError(error).message }, { source: SOURCE });
    }
  }

  private toAuthError(error: unknown): AuthError {
    if (error instanceof AuthError) {
      return error;
    }
    if (error instanceof FetchError) {
      switch (error.kind) {
        case 'Unauthenticated':
          return new AuthError('InvalidCredential', `Login failed: ${error.message}`, error);
        case 'ServerError':
          if (error.status !== undefined && error.status >= 400 && error.status < 500) {
            return new AuthError('InvalidCredential', `Login failed: ${error.message}`, error);
          }
          if (error.message === 'Invalid response format') {
            return new AuthError('MalformedToken', 'Could not retrieve authentication credentials', error);
          }
          return new AuthError('NetworkFailure', `Login failed: ${error.message}`, error);
        default:
          return new AuthError('NetworkFailure', `Login failed: ${error.message}`, error);
      }
    }
    return new AuthError('NetworkFailure', `Login failed: ${toError(error).message}`, toError(error));
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }
}
