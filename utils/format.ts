import type { DatasetKind, FilterParams } from '../types/mining';

const UPPERCASE_WORDS = new Set(['id', 'gda94', 'mga', 'ppm', 'ppb', 'eoh', 'crs']);

/**
 * Turns an API column name into a table header, e.g. `hole_id` -> `Hole ID`
 */
export function formatColumnName(column: string): string {
  return column
    .split(/[_\s]+/)
    .filter(Boolean)
    .map(word => {
      const lower = word.toLowerCase();
      if (UPPERCASE_WORDS.has(lower)) return lower.toUpperCase();
      return lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join(' ');
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

export function formatPercent(done: number, total: number): number {
  if (total <= 0) return 0;
  return Math.min(100, Math.round((done / total) * 1000) / 10);
}

const MAX_LAYER_NAME_LENGTH = 50;

function listValues(value: FilterParams[string] | undefined): string[] {
  if (Array.isArray(value)) return value.map(String);
  if (typeof value === 'string' && value) return value.split(',');
  return [];
}

/**
 * Default layer name built from the filters of a fetch, e.g. `Holes_WA_Acme_100rec`
 */
export function buildLayerName(kind: DatasetKind, filters: FilterParams, requestedCount: number, fetchAll = false): string {
  const parts: string[] = [kind];

  const states = listValues(filters.states);
  if (states.length > 3) {
    parts.push(`${states.length}States`);
  } else {
    parts.push(...states);
  }

  if (kind === 'Holes') {
    const companies = listValues(filters.companies);
    if (companies.length > 2) {
      parts.push(`${companies.length}Cos`);
    } else {
      parts.push(...companies.map(company => company.slice(0, 10)));
    }
  } else {
    if (typeof filters.element === 'string') parts.push(filters.element);
    if (typeof filters.operator === 'string') {
      parts.push(filters.value !== undefined && filters.value !== null ? `${filters.operator}${filters.value}ppm` : filters.operator);
    }
  }

  if (filters.fetch_only_location === true) parts.push('LocationOnly');
  if (!fetchAll) parts.push(`${requestedCount}rec`);

  const name = parts.join('_');
  return name.length > MAX_LAYER_NAME_LENGTH ? `${name.slice(0, MAX_LAYER_NAME_LENGTH - 3)}...` : name;
}
