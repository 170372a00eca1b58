/**
 * API module
 *
 * HTTP client, method table and bound API for FlightXML2.
 */

export * from './client';
export * from './config';
export * from './envelope';
export * from './flightxml';
export * from './methods';
export * from './transport';
