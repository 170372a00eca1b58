import { FlightXmlClient } from './client';
import { loadConfigFromEnv } from './config';
import { FLIGHTXML_METHODS } from './methods';
import type {
  FlightXmlClientConfig,
  ImplementedMethod,
  UnimplementedMethod,
} from '../types/client';

/**
 * Typed functions for every FlightXML2 method, bound to one client
 *
 * Example:
 * ```ts
 * const client = new FlightXmlClient({ username: 'pilot', apiKey: '...' });
 * const api = createFlightXmlApi(client);
 *
 * const airport = await api.airportInfo({ airport: 'KSFO' });
 * const boeings = await api.search({ parameters: { type: 'B77*' } });
 * ```
 *
 * Unimplemented methods (NotImplementedError) and arguments that cannot be
 * encoded (ValidationError) throw synchronously instead of returning a
 * rejected promise. Use `await` inside try/catch to handle both alike;
 * `.catch()` chained on the call does not see them.
 */
export function createFlightXmlApi(client: FlightXmlClient) {
  const bind =
    <A, R>(definition: ImplementedMethod<A, R>) =>
    (args: A): Promise<R> =>
      client.call(definition, args);

  const unavailable =
    (definition: UnimplementedMethod) =>
    (): Promise<never> =>
      client.call<void, never>(definition, undefined);

  const m = FLIGHTXML_METHODS;

  return {
    aircraftType: bind(m.aircraftType),
    airlineFlightInfo: bind(m.airlineFlightInfo),
    airlineFlightSchedules: bind(m.airlineFlightSchedules),
    airlineInfo: bind(m.airlineInfo),
    airlineInsight: bind(m.airlineInsight),
    airportInfo: bind(m.airportInfo),
    allAirlines: bind(m.allAirlines),
    allAirports: bind(m.allAirports),
    blockIdentCheck: bind(m.blockIdentCheck),
    countAirportOperations: bind(m.countAirportOperations),
    countAllEnrouteAirlineOperations: bind(m.countAllEnrouteAirlineOperations),
    decodeFlightRoute: bind(m.decodeFlightRoute),
    decodeRoute: unavailable(m.decodeRoute),
    arrived: bind(m.arrived),
    departed: bind(m.departed),
    enroute: bind(m.enroute),
    scheduled: bind(m.scheduled),
    fleetArrived: unavailable(m.fleetArrived),
    fleetScheduled: unavailable(m.fleetScheduled),
    flightInfo: unavailable(m.flightInfo),
    flightInfoEx: unavailable(m.flightInfoEx),
    getFlightId: bind(m.getFlightId),
    getHistoricalTrack: unavailable(m.getHistoricalTrack),
    getLastTrack: bind(m.getLastTrack),
    inboundFlightInfo: unavailable(m.inboundFlightInfo),
    inFlightInfo: bind(m.inFlightInfo),
    latLngToDistance: unavailable(m.latLngToDistance),
    latLngToHeading: unavailable(m.latLngToHeading),
    mapFlight: unavailable(m.mapFlight),
    mapFlightEx: unavailable(m.mapFlightEx),
    metar: bind(m.metar),
    metarEx: bind(m.metarEx),
    ntaf: bind(m.ntaf),
    taf: bind(m.taf),
    routesBetweenAirports: bind(m.routesBetweenAirports),
    routesBetweenAirportsEx: unavailable(m.routesBetweenAirportsEx),
    search: bind(m.search),
    searchBirdseyeInFlight: unavailable(m.searchBirdseyeInFlight),
    searchBirdseyePositions: unavailable(m.searchBirdseyePositions),
    searchCount: unavailable(m.searchCount),
    setMaximumResultSizes: unavailable(m.setMaximumResultSizes),
    tailOwner: bind(m.tailOwner),
    zipcodeInfo: bind(m.zipcodeInfo),
    getAlerts: bind(m.getAlerts),
    deleteAlert: bind(m.deleteAlert),
    setAlert: bind(m.setAlert),
    registerAlertEndpoint: bind(m.registerAlertEndpoint),
  };
}

export type FlightXmlApi = ReturnType<typeof createFlightXmlApi>;

/**
 * Build a client and its bound API in one step
 */
export function createFlightXml(config: FlightXmlClientConfig): FlightXmlApi & { client: FlightXmlClient } {
  const client = new FlightXmlClient(config);
  return { ...createFlightXmlApi(client), client };
}

/**
 * Build a client from FLIGHTXML_* environment variables
 */
export function createFlightXmlFromEnv(
  env: Record<string, string | undefined> = process.env
): FlightXmlApi & { client: FlightXmlClient } {
  return createFlightXml(loadConfigFromEnv(env));
}
