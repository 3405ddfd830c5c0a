import { z } from 'zod';
import { RequestGateway } from '../../services/api/request-gateway';
import { FetchError, TierLimitExceededError } from '../../errors/types';
import { createTokenStore } from '../../../store/session/tokenStore';
import type { Role } from '../../../types/mining';
import { FakeHttpServer } from '../helpers/fake-http';
import { createClock, START_SECONDS } from '../helpers/harness';

const okSchema = z.object({ ok: z.boolean() });

function setup(role?: Role) {
  const server = new FakeHttpServer(() => ({ status: 200, data: { ok: true } }));
  const clock = createClock();
  const tokenStore = createTokenStore();
  if (role) {
    tokenStore.getState().set({ accessToken: 'test-access-token', expiresAt: START_SECONDS + 3600, role });
  }
  const gateway = new RequestGateway({
    tokenStore,
    baseUrl: 'https://api.test.local/',
    http: server.createClient(),
    now: clock.now
  });
  return { server, clock, tokenStore, gateway };
}

async function expectFetchError(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FetchError) return error;
    throw error;
  }
  throw new Error('expected a FetchError');
}

describe('RequestGateway', () => {
  it('should attach the bearer token and resolve relative URLs', async () => {
    const { server, gateway } = setup('Premium');

    const result = await gateway.dispatch({ method: 'GET', url: '/plugin/ping', params: { a: 1 }, schema: okSchema }, { requiresAuth: true }).response;

    expect(result).toEqual({ ok: true });
    expect(server.requests).toHaveLength(1);
    expect(server.requests[0].url).toBe('https://api.test.local/plugin/ping');
    expect(server.requests[0].params).toEqual({ a: 1 });
    expect(server.requests[0].authorization).toBe('Bearer test-access-token');
  });

  it('should send unauthenticated calls without a token', async () => {
    const { server, gateway } = setup();
    await gateway.dispatch({ method: 'POST', url: 'https://auth.test.local/signIn', data: { x: 1 }, schema: okSchema }, { requiresAuth: false }).response;

    expect(server.requests[0].authorization).toBeUndefined();
    expect(server.requests[0].data).toEqual({ x: 1 });
  });

  it('should fail fast without a valid token', () => {
    const { server, gateway } = setup();
    expect(() => gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true })).toThrow(FetchError);
    expect(server.requests).toHaveLength(0);
  });

  it('should treat an expired token as missing', () => {
    const { server, clock, gateway } = setup('Premium');
    clock.advanceSeconds(3600);

    try {
      gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true });
      throw new Error('expected dispatch to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) expect(error.kind).toBe('Unauthenticated');
    }
    expect(server.requests).toHaveLength(0);
  });

  describe('tier limits', () => {
    it('should stop a free trial above 1,000 records with no network call', () => {
      const { server, gateway } = setup('FreeTrial');

      try {
        gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true, recordCount: 5000 });
        throw new Error('expected dispatch to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(TierLimitExceededError);
        if (error instanceof TierLimitExceededError) {
          expect(error.requested).toBe(5000);
          expect(error.allowed).toBe(1000);
          expect(error.message).toBe('Requested 5,000 records but your plan allows 1,000');
        }
      }
      expect(server.requests).toHaveLength(0);
      expect(gateway.inFlightCount()).toBe(0);
    });

    it('should allow a free trial exactly at its limit', () => {
      const { gateway } = setup('FreeTrial');
      expect(() => gateway.checkTierLimit(1000)).not.toThrow();
    });

    it('should let premium fetch up to the API ceiling', () => {
      const { gateway } = setup('Premium');
      expect(() => gateway.checkTierLimit(5000000)).not.toThrow();
      expect(() => gateway.checkTierLimit(5000001)).toThrow(TierLimitExceededError);
    });

    it('should apply the free trial limit when no one is logged in', () => {
      const { gateway } = setup();
      expect(() => gateway.checkTierLimit(1001)).toThrow(TierLimitExceededError);
    });
  });

  describe('status mapping', () => {
    it.each([401, 403])('should map %i to Unauthenticated', async (status) => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ status, data: { error: 'Token rejected' } }));

      const error = await expectFetchError(gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true }).response);
      expect(error.kind).toBe('Unauthenticated');
      expect(error.status).toBe(status);
      expect(error.message).toBe('Token rejected');
    });

    it('should map other error statuses to ServerError', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ status: 500, data: 'boom' }));

      const error = await expectFetchError(gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true }).response);
      expect(error.kind).toBe('ServerError');
      expect(error.status).toBe(500);
      expect(error.message).toBe('Server responded with status 500');
    });

    it('should treat an error body as a server error', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ status: 200, data: { error: { message: 'Invalid element' } } }));

      const error = await expectFetchError(gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true }).response);
      expect(error.kind).toBe('ServerError');
      expect(error.message).toBe('Invalid element');
    });

    it('should reject a body that does not match the schema', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ status: 200, data: { ok: 'yes' } }));

      const error = await expectFetchError(gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true }).response);
      expect(error.message).toBe('Invalid response format');
    });

    it('should map transport failures to NetworkFailure', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ networkError: 'socket hang up' }));

      const error = await expectFetchError(gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true }).response);
      expect(error.kind).toBe('NetworkFailure');
      expect(error.message).toBe('socket hang up');
    });
  });

  describe('in-flight set', () => {
    it('should track a call until it settles', async () => {
      const { gateway } = setup('Premium');
      const handle = gateway.dispatch({ method: 'GET', url: 'x', schema: okSchema }, { requiresAuth: true, kind: 'fetch-page' });

      expect(gateway.inFlightCount()).toBe(1);
      expect(gateway.getInFlight()[0]).toEqual(expect.objectContaining({ id: handle.id, kind: 'fetch-page', url: 'https://api.test.local/x' }));

      await handle.response;
      expect(gateway.inFlightCount()).toBe(0);
    });

    it('should cancel every call at once', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(() => ({ hang: true }));

      const first = gateway.dispatch({ method: 'GET', url: 'a', schema: okSchema }, { requiresAuth: true });
      const second = gateway.dispatch({ method: 'GET', url: 'b', schema: okSchema }, { requiresAuth: true });
      expect(gateway.inFlightCount()).toBe(2);

      gateway.cancelAll();

      expect(gateway.inFlightCount()).toBe(0);
      const errors = await Promise.all([expectFetchError(first.response), expectFetchError(second.response)]);
      expect(errors.map(error => error.kind)).toEqual(['Cancelled', 'Cancelled']);
    });

    it('should cancel a single call by handle', async () => {
      const { server, gateway } = setup('Premium');
      server.setHandler(request => (request.url.endsWith('/slow') ? { hang: true } : { status: 200, data: { ok: true } }));

      const slow = gateway.dispatch({ method: 'GET', url: 'slow', schema: okSchema }, { requiresAuth: true });
      const fast = gateway.dispatch({ method: 'GET', url: 'fast', schema: okSchema }, { requiresAuth: true });
      slow.cancel();

      const [slowError, fastResult] = await Promise.all([expectFetchError(slow.response), fast.response]);
      expect(slowError.kind).toBe('Cancelled');
      expect(fastResult).toEqual({ ok: true });
    });

    it('should accept cancelAll on an empty set', () => {
      const { gateway } = setup();
      expect(() => gateway.cancelAll()).not.toThrow();
      expect(gateway.inFlightCount()).toBe(0);
    });
  });
});
