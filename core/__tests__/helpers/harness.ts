import { createImporterCore, ImporterCore } from '../../plugin/create-importer-core';
import type { ApiConfig } from '../../config/settings';
import type { CoreEventBus, CoreEventName, CoreEvents } from '../../events/event-bus';
import { InMemorySettingsStore } from '../../settings/settings-store';
import type { MiningRecord } from '../../../types/mining';
import { FakeHttpServer, FakeReply, FakeRequest } from './fake-http';
import { makeAccessToken } from './tokens';

export const TEST_CONFIG: ApiConfig = {
  apiKey: 'test-key',
  baseApiUrl: 'https://api.test.local',
  authUrl: 'https://auth.test.local/signIn',
  refreshUrl: 'https://auth.test.local/token',
  requestTimeoutMs: 1000
};

// 2026-01-01T00:00:00Z
export const START_MS = 1767225600000;
export const START_SECONDS = START_MS / 1000;

export interface TestClock {
  ms: number;
  now: () => number;
  advanceSeconds: (seconds: number) => void;
}

export function createClock(start: number = START_MS): TestClock {
  const clock: TestClock = {
    ms: start,
    now: () => clock.ms,
    advanceSeconds: (seconds: number) => {
      clock.ms += seconds * 1000;
    }
  };
  return clock;
}

export interface Harness extends ImporterCore {
  server: FakeHttpServer;
  clock: TestClock;
  settings: InMemorySettingsStore;
}

const liveHarnesses: Harness[] = [];

/**
 * Stops refresh timers and listeners of every harness created so far
 */
export function disposeHarnesses(): void {
  liveHarnesses.splice(0).forEach(harness => harness.controller.dispose());
}

export function createHarness(options: { pageSize?: number; settings?: InMemorySettingsStore } = {}): Harness {
  const server = new FakeHttpServer();
  const clock = createClock();
  const settings = options.settings ?? new InMemorySettingsStore();
  const core = createImporterCore({
    config: TEST_CONFIG,
    settings,
    http: server.createClient(),
    now: clock.now,
    pageSize: options.pageSize
  });
  const harness: Harness = { ...core, settings, server, clock };
  liveHarnesses.push(harness);
  return harness;
}

export function signInReply(options: { role?: string; lifetimeSeconds?: number; now?: number } = {}): FakeReply {
  const issuedAt = options.now ?? START_SECONDS;
  return {
    status: 200,
    data: {
      idToken: makeAccessToken({ exp: issuedAt + (options.lifetimeSeconds ?? 3600), role: options.role }),
      refreshToken: 'test-refresh-token',
      expiresIn: String(options.lifetimeSeconds ?? 3600)
    }
  };
}

/**
 * Logs in against the fake identity endpoint, keeping whatever handler was installed for other URLs
 */
export async function loginAs(harness: Harness, role: string = 'premium', dataHandler?: (request: FakeRequest) => FakeReply): Promise<void> {
  harness.server.setHandler(request => {
    if (request.url === TEST_CONFIG.authUrl) {
      return signInReply({ role, now: harness.clock.ms / 1000 });
    }
    return dataHandler ? dataHandler(request) : { status: 404, data: { error: 'Not found' } };
  });
  await harness.session.login('analyst@example.com', 'test-password');
}

export function makeRecords(count: number, offset = 0): MiningRecord[] {
  const records: MiningRecord[] = [];
  for (let i = 0; i < count; i++) {
    const n = offset + i;
    records.push({ hole_id: `H${n}`, depth: n % 500, company_name: 'Test Co' });
  }
  return records;
}

/**
 * Serves `total` synthetic records through limit/skip pagination
 */
export function pagedDataHandler(total: number): (request: FakeRequest) => FakeReply {
  return request => {
    const limit = Number(request.params.limit);
    const skip = Number(request.params.skip);
    const count = Math.max(0, Math.min(limit, total - skip));
    return {
      status: 200,
      data: {
        data: makeRecords(count, skip),
        columns: ['hole_id', 'depth', 'company_name'],
        total_count: total
      }
    };
  };
}

export function recordEvents<K extends CoreEventName>(events: CoreEventBus, event: K): Array<CoreEvents[K]> {
  const received: Array<CoreEvents[K]> = [];
  events.on(event, payload => {
    received.push(payload);
  });
  return received;
}

export function nextEvent<K extends CoreEventName>(events: CoreEventBus, event: K): Promise<CoreEvents[K]> {
  return new Promise(resolve => {
    const unsubscribe = events.on(event, payload => {
      unsubscribe();
      resolve(payload);
    });
  });
}
