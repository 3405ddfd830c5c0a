import { DEFAULT_HOLE_TYPES } from '../../config/constants';
import { FetchError } from '../../errors/types';
import { createHarness, disposeHarnesses, loginAs } from '../helpers/harness';

describe('CatalogService', () => {
  afterEach(() => {
    disposeHarnesses();
  });

  describe('searchCompanies', () => {
    it('should not query for fewer than three characters', async () => {
      const harness = createHarness();
      await loginAs(harness);

      await expect(harness.catalog.searchCompanies(' ab ')).resolves.toEqual([]);
      expect(harness.server.requestsTo('companies/search')).toHaveLength(0);
    });

    it('should send the trimmed query and read a plain list', async () => {
      const harness = createHarness();
      await loginAs(harness, 'premium', () => ({ status: 200, data: ['Acme Resources', { name: 'Bedrock Mining' }] }));

      await expect(harness.catalog.searchCompanies('  acm ')).resolves.toEqual(['Acme Resources', 'Bedrock Mining']);
      expect(harness.server.requestsTo('companies/search')[0].params).toEqual({ company_name: 'acm' });
    });

    it('should read a wrapped list', async () => {
      const harness = createHarness();
      await loginAs(harness, 'premium', () => ({ status: 200, data: { companies: [{ name: 'Acme Resources', id: 4 }] } }));

      await expect(harness.catalog.searchCompanies('acme')).resolves.toEqual(['Acme Resources']);
    });

    it('should require a session', async () => {
      const harness = createHarness();
      await expect(harness.catalog.searchCompanies('acme')).rejects.toBeInstanceOf(FetchError);
      expect(harness.server.requests).toHaveLength(0);
    });
  });

  describe('fetchHoleTypes', () => {
    it('should return the served hole types', async () => {
      const harness = createHarness();
      await loginAs(harness, 'premium', () => ({ status: 200, data: { data: ['RC', 'DD'] } }));

      await expect(harness.catalog.fetchHoleTypes()).resolves.toEqual(['RC', 'DD']);
    });

    it('should fall back to the defaults on failure', async () => {
      const harness = createHarness();
      await loginAs(harness, 'premium', () => ({ status: 502, data: 'Bad Gateway' }));

      await expect(harness.catalog.fetchHoleTypes()).resolves.toEqual(DEFAULT_HOLE_TYPES);
    });

    it('should fall back to the defaults when logged out', async () => {
      const harness = createHarness();
      await expect(harness.catalog.fetchHoleTypes()).resolves.toEqual(DEFAULT_HOLE_TYPES);
    });
  });
});
