import { describe, it, expect } from 'vitest';
import { buildSearchQuery } from '../query';

describe('buildSearchQuery', () => {
  it('returns an empty query for no filters', () => {
    expect(buildSearchQuery({})).toBe('');
  });

  it('joins filters in insertion order with a trailing space', () => {
    expect(buildSearchQuery({ type: 'B77*', belowAltitude: 100 })).toBe(
      '-type B77* -belowAltitude 100 '
    );
  });

  it('keeps values with spaces as given', () => {
    expect(buildSearchQuery({ latlong: '"44.953 -111.045 40.962 -104.046"' })).toBe(
      '-latlong "44.953 -111.045 40.962 -104.046" '
    );
  });

  it('follows the order the caller built the filters in', () => {
    expect(buildSearchQuery({ destination: 'LAX', prefix: 'H' })).toBe('-destination LAX -prefix H ');
    expect(buildSearchQuery({ prefix: 'H', destination: 'LAX' })).toBe('-prefix H -destination LAX ');
  });
});
