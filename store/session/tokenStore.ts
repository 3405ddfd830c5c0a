import { createStore, StoreApi } from 'zustand/vanilla';
import type { Role, Session } from '../../types/mining';
import { SessionStateError } from '../../core/errors/types';

export interface SessionFields {
  accessToken: string;
  refreshToken?: string;
  expiresAt: number;
  role: Role;
  lastIdentity?: string;
}

export interface TokenStore {
  // State
  session: Session;

  // Actions
  set: (fields: SessionFields) => void;
  setLastIdentity: (identity: string | undefined) => void;
  clear: () => void;
}

export const EMPTY_SESSION: Session = {
  accessToken: undefined,
  refreshToken: undefined,
  expiresAt: 0,
  role: undefined,
  lastIdentity: undefined
};

export const tokenSelectors = {
  hasToken: (state: TokenStore): boolean => state.session.accessToken !== undefined,

  isValidAt: (state: TokenStore, nowSeconds: number): boolean =>
    state.session.accessToken !== undefined && nowSeconds < state.session.expiresAt,

  getRole: (state: TokenStore): Role | undefined => state.session.role
};

/**
 * Pure holder of the authentication state. Only the session controller writes to it.
 */
export function createTokenStore(): StoreApi<TokenStore> {
  return createStore<TokenStore>()((set) => ({
    session: { ...EMPTY_SESSION },

    set: (fields) => {
      if (!fields.accessToken || !fields.role) {
        throw new SessionStateError('Access token and role must be set together');
      }
      if (!Number.isFinite(fields.expiresAt) || fields.expiresAt <= 0) {
        throw new SessionStateError('A session needs a positive expiry', { expiresAt: fields.expiresAt });
      }
      set({
        session: {
          accessToken: fields.accessToken,
          refreshToken: fields.refreshToken,
          expiresAt: fields.expiresAt,
          role: fields.role,
          lastIdentity: fields.lastIdentity
        }
      });
    },

    setLastIdentity: (identity) => {
      set((state) => ({ session: { ...state.session, lastIdentity: identity } }));
    },

    clear: () => {
      set({ session: { ...EMPTY_SESSION } });
    }
  }));
}
