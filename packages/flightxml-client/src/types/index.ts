/**
 * Types module
 *
 * Zod schemas, wire types, enumerations and error classes.
 */

export * from './api';
export * from './client';
