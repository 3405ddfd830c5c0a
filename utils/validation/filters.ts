import { z } from 'zod';
import {
  AUSTRALIAN_STATES,
  COMPARISON_OPERATORS,
  DEFAULT_REQUESTED_COUNT,
  HARD_API_RECORD_CEILING,
  VALIDATION_MESSAGES
} from '../../core/config/constants';
import { ValidationError } from '../../core/errors/types';
import type { DatasetKind, FilterParams } from '../../types/mining';
import { firstIssueMessage } from './auth';

const STATE_CODES = AUSTRALIAN_STATES.map(([, code]) => code);

const stateSchema = z
  .string()
  .trim()
  .toUpperCase()
  .refine((code) => STATE_CODES.includes(code), { message: 'Unknown state code' });

const baseFilterSchema = z.object({
  states: z.array(stateSchema).default([]),
  companies: z.array(z.string().trim().min(1)).default([]),
  requestedCount: z.coerce
    .number()
    .int('Record count must be a whole number')
    .positive('Record count must be positive')
    .max(HARD_API_RECORD_CEILING)
    .default(DEFAULT_REQUESTED_COUNT),
  holeTypes: z.array(z.string().trim().min(1)).default([]),
  fetchAllRecords: z.boolean().default(false),
  fetchLocationOnly: z.boolean().default(false),
});

const holesFilterSchema = baseFilterSchema.extend({
  maxDepth: z.coerce.number().nonnegative('Max depth cannot be negative').optional(),
});

const assaysFilterSchema = baseFilterSchema.extend({
  element: z.string().trim().toLowerCase().min(1, 'Please select an element for filtering.'),
  operator: z.enum(COMPARISON_OPERATORS, {
    errorMap: () => ({ message: 'Please select a comparison operator.' }),
  }).optional(),
  value: z.coerce.number({ invalid_type_error: 'Filter value must be a number.' }).optional(),
});

export interface ParsedFilters {
  filters: FilterParams;
  requestedCount: number;
  /** The caller resolves the count from the tier ceiling */
  fetchAll: boolean;
}

/**
 * "Fetch all" is only served one state at a time
 */
export function validateFetchAllRequest(states: string[]): string | undefined {
  if (states.length === 0) return VALIDATION_MESSAGES.fetchAllNoState;
  if (states.length > 1) return VALIDATION_MESSAGES.fetchAllMultipleStates;
  return undefined;
}

function compact(params: Record<string, FilterParams[string] | undefined>): FilterParams {
  const result: FilterParams = {};
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (Array.isArray(value) && value.length === 0) continue;
    result[key] = value;
  }
  return result;
}

/**
 * Validates UI filter input and maps it onto the API's query parameter names
 */
export function parseFilters(kind: DatasetKind, input: unknown): ParsedFilters {
  const parsed = kind === 'Holes'
    ? holesFilterSchema.safeParse(input)
    : assaysFilterSchema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError(firstIssueMessage(parsed.error), 'INVALID_FILTERS', parsed.error, {
      kind,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    });
  }

  const data = parsed.data;
  if (data.fetchAllRecords) {
    const message = validateFetchAllRequest(data.states);
    if (message) {
      throw new ValidationError(message, 'INVALID_FETCH_ALL', undefined, { kind, states: data.states });
    }
  }

  const common = {
    states: data.states,
    companies: data.companies,
    hole_type: data.holeTypes,
    fetch_only_location: data.fetchLocationOnly ? true : undefined
  };
  const counts = { requestedCount: data.requestedCount, fetchAll: data.fetchAllRecords };

  if ('element' in data) {
    if (data.value !== undefined && data.operator === undefined) {
      throw new ValidationError('Please select a comparison operator.', 'INVALID_FILTERS', undefined, { kind });
    }
    return {
      ...counts,
      filters: compact({
        ...common,
        element: data.element,
        operator: data.operator,
        value: data.value
      })
    };
  }

  return {
    ...counts,
    filters: compact({
      ...common,
      max_depth: data.maxDepth
    })
  };
}
