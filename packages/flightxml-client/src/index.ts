/**
 * flightxml-client
 *
 * Client binding for the FlightXML2 JSON API.
 *
 * This package provides:
 * - HTTP client, method table and bound API (api/)
 * - Zod schemas, wire types and error classes (types/)
 * - Timestamp converters and the search query builder (utils/)
 */

// API exports
export * from './api/index';

// Type exports
export * from './types/index';

// Utility exports
export * from './utils/index';
