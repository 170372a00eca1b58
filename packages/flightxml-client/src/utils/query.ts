import type { SearchFilters } from '../types/api';

/**
 * Builds a Search query expression from filters.
 *
 * Each entry becomes `-key value ` (trailing space included), in the
 * insertion order of `filters`:
 *
 * ```ts
 * buildSearchQuery({ type: 'B77*', belowAltitude: 100 });
 * // => '-type B77* -belowAltitude 100 '
 * ```
 */
export function buildSearchQuery(filters: SearchFilters): string {
  let query = '';
  for (const [key, value] of Object.entries(filters)) {
    query += `-${key} ${value} `;
  }
  return query;
}
