import {
  AuthenticationError,
  FlightXmlError,
  NotImplementedError,
  TransportError,
} from '../types/client';
import type {
  ClientLogger,
  FlightXmlClientConfig,
  MethodDefinition,
  Transport,
  TransportResponse,
} from '../types/client';
import type { JsonValue, WireParams } from '../types/api';
import { parseBody, unwrapEnvelope } from './envelope';
import { basicAuthorization, createFetchTransport, encodeForm } from './transport';

export const DEFAULT_BASE_URL = 'http://flightxml.flightaware.com/json/FlightXML2/';

const REJECTED_STATUSES = new Set([401, 403]);

const SILENT_LOGGER: ClientLogger = {
  debug: () => undefined,
};

/**
 * HTTP client for the FlightXML2 JSON API
 *
 * Features:
 * - Form-encoded POST per remote method
 * - HTTP Basic authentication from fixed credentials
 * - Response envelope unwrapping
 * - Declarative method dispatch via `call`
 *
 * Holds nothing but its configuration, so concurrent calls are safe.
 */
export class FlightXmlClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly transport: Transport;
  private readonly logger: ClientLogger;

  constructor(config: FlightXmlClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.authorization = basicAuthorization(config.username, config.apiKey);
    this.transport = config.transport ?? createFetchTransport(config.requestTimeoutMs ?? 30000);
    this.logger = config.logger ?? SILENT_LOGGER;
  }

  /**
   * Invoke a remote method with wire params and return the unwrapped result
   */
  async invoke(method: string, params: WireParams = {}): Promise<JsonValue> {
    const url = `${this.baseUrl}/${method}`;
    this.logger.debug(`POST ${url}`, params);

    let response: TransportResponse;
    try {
      response = await this.transport({
        url,
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: this.authorization,
        },
        body: encodeForm(params),
      });
    } catch (error) {
      if (error instanceof FlightXmlError) {
        throw error;
      }
      throw new TransportError(method, error);
    }

    if (REJECTED_STATUSES.has(response.status)) {
      throw new AuthenticationError(method, response.status);
    }

    return unwrapEnvelope(method, parseBody(method, response.body));
  }

  /**
   * Dispatch one method table entry.
   *
   * Unimplemented entries and arguments that cannot be encoded throw
   * synchronously, before anything is sent.
   */
  call<A, R>(definition: MethodDefinition<A, R>, args: A): Promise<R> {
    if (!definition.implemented) {
      throw new NotImplementedError(definition.remote);
    }

    const params = definition.encode(args);
    return this.invoke(definition.remote, params).then(definition.decode);
  }
}
