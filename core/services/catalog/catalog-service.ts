import { z } from 'zod';
import { logger } from '../../../utils/logging/logger';
import { API_ENDPOINTS, COMPANY_SEARCH_MIN_LENGTH, DEFAULT_HOLE_TYPES } from '../../config/constants';
import { toError } from '../../errors/types';
import type { RequestGateway } from '../api/request-gateway';

const SOURCE = 'CatalogService';

const companyEntrySchema = z.union([
  z.string(),
  z.number().transform(String),
  z.object({ name: z.string() }).passthrough().transform(company => company.name)
]);

// The search endpoint answers with a bare list or with `{ companies: [...] }`
const companySearchResponseSchema = z.union([
  z.array(companyEntrySchema),
  z.object({ companies: z.array(companyEntrySchema).default([]) }).transform(body => body.companies)
]);

const holeTypesResponseSchema = z.union([
  z.array(z.string()),
  z.object({ data: z.array(z.string()) }).transform(body => body.data),
  z.object({ hole_types: z.array(z.string()) }).transform(body => body.hole_types)
]);

/**
 * Lookups that feed the filter widgets
 */
export class CatalogService {
  constructor(private readonly gateway: RequestGateway) {}

  /**
   * Short queries resolve to an empty list without touching the network.
   * Throws FetchError(Unauthenticated) when there is no valid session.
   */
  async searchCompanies(query: string): Promise<string[]> {
    const trimmed = query.trim();
    if (trimmed.length < COMPANY_SEARCH_MIN_LENGTH) {
      return [];
    }

    const companies = await this.gateway.dispatch({
      method: 'GET',
      url: API_ENDPOINTS.companiesSearch,
      params: { company_name: trimmed },
      schema: companySearchResponseSchema
    }, { requiresAuth: true, kind: 'other' }).response;

    await logger.debug('Company search', { query: trimmed, results: companies.length }, { source: SOURCE });
    return companies;
  }

  async fetchHoleTypes(): Promise<string[]> {
    try {
      const holeTypes = await this.gateway.dispatch({
        method: 'GET',
        url: API_ENDPOINTS.holeTypes,
        schema: holeTypesResponseSchema
      }, { requiresAuth: true, kind: 'other' }).response;

      return holeTypes.length > 0 ? holeTypes : [...DEFAULT_HOLE_TYPES];
    } catch (error) {
      await logger.warn('Falling back to default hole types', { message: toError(error).message }, { source: SOURCE });
      return [...DEFAULT_HOLE_TYPES];
    }
  }
}
