import { logger } from '../../utils/logging/logger';
import { toError } from '../errors/types';
import type { DatasetKind, Role } from '../../types/mining';

const SOURCE = 'CoreEventBus';

/**
 * Notifications the core emits to the UI collaborator
 */
export interface CoreEvents {
  sessionChanged: { isAuthenticated: boolean; role?: Role };
  sessionExpired: { message: string };
  loginRequired: Record<string, never>;
  loginFailed: { message: string };
  logoutCompleted: Record<string, never>;
  fetchProgress: { kind: DatasetKind; fetched: number; total: number; page: number };
  fetchError: { kind: DatasetKind; message: string };
  loadingStarted: { kind: DatasetKind };
  loadingFinished: { kind: DatasetKind };
  statusChanged: { message: string };
}

export type CoreEventName = keyof CoreEvents;

const CORE_EVENT_NAMES: readonly CoreEventName[] = [
  'sessionChanged',
  'sessionExpired',
  'loginRequired',
  'loginFailed',
  'logoutCompleted',
  'fetchProgress',
  'fetchError',
  'loadingStarted',
  'loadingFinished',
  'statusChanged'
];

type Listener<K extends CoreEventName> = (payload: CoreEvents[K]) => void;

type ListenerMap = { [K in CoreEventName]: Array<Listener<K>> };

/**
 * Explicit observer registry. Each core instance owns its bus; there is no global dispatch.
 */
export class CoreEventBus {
  private listeners: ListenerMap = {
    sessionChanged: [],
    sessionExpired: [],
    loginRequired: [],
    loginFailed: [],
    logoutCompleted: [],
    fetchProgress: [],
    fetchError: [],
    loadingStarted: [],
    loadingFinished: [],
    statusChanged: []
  };

  on<K extends CoreEventName>(event: K, listener: Listener<K>): () => void {
    this.listeners[event].push(listener);
    return () => this.off(event, listener);
  }

  off<K extends CoreEventName>(event: K, listener: Listener<K>): void {
    const current: Array<Listener<K>> = this.listeners[event];
    const index = current.indexOf(listener);
    if (index >= 0) {
      current.splice(index, 1);
    }
  }

  /**
   * A listener that throws is logged and skipped; the remaining listeners still run
   */
  emit<K extends CoreEventName>(event: K, payload: CoreEvents[K]): void {
    // Copy so a listener can unsubscribe while handling
    const current: Array<Listener<K>> = [...this.listeners[event]];
    current.forEach(listener => {
      try {
        listener(payload);
      } catch (error) {
        void logger.error('Event listener failed', { event, message: toError(error).message }, { source: SOURCE });
      }
    });
  }

  listenerCount(event: CoreEventName): number {
    return this.listeners[event].length;
  }

  removeAllListeners(): void {
    CORE_EVENT_NAMES.forEach(event => {
      this.listeners[event].length = 0;
    });
  }
}
