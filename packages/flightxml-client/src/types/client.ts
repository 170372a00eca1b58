import type { ZodIssue } from 'zod';
import type { JsonValue, WireParams } from './api';

/**
 * Outbound request handed to a transport
 */
export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
  body: string;
}

/**
 * Raw response returned by a transport
 */
export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Sends one request and resolves with the raw response.
 * Rejects only when the request could not complete.
 */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

/**
 * Logging sink; `console` satisfies it
 */
export interface ClientLogger {
  debug(message: string, ...details: unknown[]): void;
}

/**
 * FlightXML client configuration
 */
export interface FlightXmlClientConfig {
  username: string;
  apiKey: string;
  baseUrl?: string;
  requestTimeoutMs?: number;
  transport?: Transport;
  /** Receives a debug record per request. Silent when omitted; pass `console` to print. */
  logger?: ClientLogger;
}

/**
 * FlightXML error types
 */
export class FlightXmlError extends Error {
  method?: string;

  constructor(message: string, method?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FlightXmlError';
    this.method = method;
  }
}

export class NotImplementedError extends FlightXmlError {
  constructor(method: string) {
    super(`${method} is not implemented by this client`, method);
    this.name = 'NotImplementedError';
  }
}

export class ValidationError extends FlightXmlError {
  issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class TransportError extends FlightXmlError {
  constructor(method: string, cause: unknown) {
    super(
      `Request failed: ${method}: ${cause instanceof Error ? cause.message : String(cause)}`,
      method,
      { cause }
    );
    this.name = 'TransportError';
  }
}

export class AuthenticationError extends FlightXmlError {
  status: number;

  constructor(method: string, status: number) {
    super(`Credentials rejected with status ${status}: ${method}`, method);
    this.name = 'AuthenticationError';
    this.status = status;
  }
}

export class ProtocolError extends FlightXmlError {
  data?: unknown;

  constructor(message: string, method?: string, data?: unknown) {
    super(message, method);
    this.name = 'ProtocolError';
    this.data = data;
  }
}

/**
 * Application-level failure reported inside a well-formed response.
 * The client never throws this itself; see `remoteErrorOf`.
 */
export class RemoteError extends FlightXmlError {
  code?: string;
  data: unknown;

  constructor(message: string, code?: string, data?: unknown) {
    super(message);
    this.name = 'RemoteError';
    this.code = code;
    this.data = data;
  }
}

/**
 * One entry of the method table.
 *
 * `encode` turns caller arguments into wire params and `decode` post-processes
 * the unwrapped result.
 */
export interface ImplementedMethod<A, R> {
  readonly remote: string;
  readonly implemented: true;
  readonly encode: (args: A) => WireParams;
  readonly decode: (result: JsonValue) => R;
}

/**
 * Placeholder for a remote method the client does not offer; never sent
 */
export interface UnimplementedMethod {
  readonly remote: string;
  readonly implemented: false;
}

export type MethodDefinition<A, R> = ImplementedMethod<A, R> | UnimplementedMethod;
