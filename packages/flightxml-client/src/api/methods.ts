import { z } from 'zod';
import {
  AirlineFlightScheduleSchema,
  AirlineInsightReportType,
  MAX_RECORD_LENGTH,
} from '../types/api';
import type {
  AircraftTypeArgs,
  AirlineArgs,
  AirlineFlightSchedulesArgs,
  AirlineInsightArgs,
  AirportArgs,
  AirportBoardArgs,
  DeleteAlertArgs,
  FlightIdArgs,
  GetFlightIdArgs,
  IdentArgs,
  JsonValue,
  RegisterAlertEndpointArgs,
  RouteArgs,
  ScheduledFlight,
  SearchArgs,
  SetAlertArgs,
  WireParams,
  WireValue,
  ZipcodeArgs,
} from '../types/api';
import { ProtocolError, ValidationError } from '../types/client';
import type { ImplementedMethod, UnimplementedMethod } from '../types/client';
import { fromWireTimestamp, toWireTimestamp } from '../utils/timestamps';
import { buildSearchQuery } from '../utils/query';
import { remoteErrorOf } from './envelope';

// =============================================================================
// FIELD MAPPING
// =============================================================================

/**
 * Wire field for one argument: its wire name, or a name plus an encoder
 */
export type FieldSpec =
  | string
  | {
      name: string;
      encode: (value: unknown) => WireValue | undefined;
    };

/**
 * Every argument of `A` mapped to its wire field
 */
export type FieldMap<A> = { readonly [K in keyof A]-?: FieldSpec };

/**
 * Wire form of a plain argument value. Absent values and empty lists yield
 * undefined, which leaves the field out of the request.
 */
export function toWireValue(field: string, value: unknown): WireValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value.length > 0 ? [...value] : undefined;
  }

  throw new ValidationError(`${field} has no wire form: ${Object.prototype.toString.call(value)}`);
}

/**
 * Argument converted with toWireTimestamp
 */
export function timestampField(name: string): FieldSpec {
  return { name, encode: toWireTimestamp };
}

/**
 * Argument that must be present
 */
export function requiredField(name: string): FieldSpec {
  return {
    name,
    encode: (value) => {
      const wire = toWireValue(name, value);
      if (wire === undefined) {
        throw new ValidationError(`${name} is required`);
      }
      return wire;
    },
  };
}

/**
 * Generic field encoder shared by every table entry.
 * Supplied arguments win over defaults; absent results are omitted.
 */
export function encodeFields(
  fields: Readonly<Record<string, FieldSpec>>,
  defaults: object,
  args: object
): WireParams {
  const supplied = new Map<string, unknown>(Object.entries(args));
  const fallback = new Map<string, unknown>(Object.entries(defaults));
  const params: WireParams = {};

  for (const [local, spec] of Object.entries(fields)) {
    const value = supplied.get(local) ?? fallback.get(local);
    const name = typeof spec === 'string' ? spec : spec.name;
    const wire = typeof spec === 'string' ? toWireValue(local, value) : spec.encode(value);
    if (wire !== undefined) {
      params[name] = wire;
    }
  }

  return params;
}

// =============================================================================
// DEFINITION BUILDERS
// =============================================================================

export function passThrough<A extends object>(
  remote: string,
  fields: FieldMap<A>,
  defaults: Partial<A> = {}
): ImplementedMethod<A, JsonValue> {
  return {
    remote,
    implemented: true,
    encode: (args) => encodeFields(fields, defaults, args),
    decode: (result) => result,
  };
}

export function noArgs(remote: string): ImplementedMethod<void, JsonValue> {
  return {
    remote,
    implemented: true,
    encode: () => ({}),
    decode: (result) => result,
  };
}

export function encoded<A>(
  remote: string,
  encode: (args: A) => WireParams
): ImplementedMethod<A, JsonValue> {
  return {
    remote,
    implemented: true,
    encode,
    decode: (result) => result,
  };
}

export function withResult<A, R>(
  definition: ImplementedMethod<A, JsonValue>,
  decode: (result: JsonValue) => R
): ImplementedMethod<A, R> {
  return { ...definition, decode };
}

export function notImplemented(remote: string): UnimplementedMethod {
  return { remote, implemented: false };
}

// =============================================================================
// RESULT DECODERS
// =============================================================================

const AirlineFlightSchedulesSchema = z.array(AirlineFlightScheduleSchema);

/**
 * Adds `departure_time` and `arrival_time` Dates to each schedule record.
 * A result that is not a list is a ProtocolError; a recognised remote error
 * message is appended to its message.
 */
export function decodeSchedules(result: JsonValue): ScheduledFlight[] {
  const parsed = AirlineFlightSchedulesSchema.safeParse(result);
  if (!parsed.success) {
    const remote = remoteErrorOf(result);
    const detail = remote ? `: ${remote.message}` : '';
    throw new ProtocolError(
      `AirlineFlightSchedules result is not a list of schedule records${detail}`,
      'AirlineFlightSchedules',
      result
    );
  }

  return parsed.data.map((record) => ({
    ...record,
    departure_time: fromWireTimestamp(record.departuretime),
    arrival_time: fromWireTimestamp(record.arrivaltime),
  }));
}

// =============================================================================
// METHOD TABLE
// =============================================================================

const PAGE_DEFAULTS = { howMany: MAX_RECORD_LENGTH, offset: 0 };

const AIRPORT_BOARD_FIELDS: FieldMap<AirportBoardArgs> = {
  airport: 'airport',
  howMany: 'howMany',
  filter: 'filter',
  offset: 'offset',
};

/**
 * Every FlightXML2 method known to the client, keyed by local name
 */
export const FLIGHTXML_METHODS = {
  /**
   * Manufacturer, type and description for an aircraft type code such as GALX.
   */
  aircraftType: passThrough<AircraftTypeArgs>('AircraftType', { aircraftType: 'type' }),

  /**
   * Gate, baggage claim and meal service details of an airline flight. Only
   * available for some carriers.
   */
  airlineFlightInfo: passThrough<FlightIdArgs>('AirlineFlightInfo', { faFlightId: 'faFlightID' }),

  /**
   * Published airline schedules, recent past to a year ahead, codeshares
   * included. `startDate` and `endDate` bound the departure time.
   */
  airlineFlightSchedules: withResult(
    passThrough<AirlineFlightSchedulesArgs>(
      'AirlineFlightSchedules',
      {
        startDate: timestampField('startDate'),
        endDate: timestampField('endDate'),
        origin: 'origin',
        destination: 'destination',
        airline: 'airline',
        flightNumber: 'flightno',
        howMany: 'howMany',
        offset: 'offset',
      },
      PAGE_DEFAULTS
    ),
    decodeSchedules
  ),

  /** Carrier details for an ICAO airline code (COA, ASA, UAL, ...). */
  airlineInfo: passThrough<AirlineArgs>('AirlineInfo', { airline: 'airlineCode' }),

  /**
   * Historical booking and fare reports between two US airports, aggregated
   * over the twelve months before the latest publication.
   */
  airlineInsight: passThrough<AirlineInsightArgs>(
    'AirlineInsight',
    { origin: 'origin', destination: 'destination', reportType: 'reportType' },
    { reportType: AirlineInsightReportType.PERCENTAGE_SCHEDULED_ACTUALLY_FLOWN }
  ),

  /**
   * Name, location, coordinates and zoneinfo time zone of an airport. The
   * time zone may carry a leading colon (":America/Chicago").
   */
  airportInfo: passThrough<AirportArgs>('AirportInfo', { airport: 'airportCode' }),

  allAirlines: noArgs('AllAirlines'),
  allAirports: noArgs('AllAirports'),

  /** 1 if the tail number is blocked from public tracking, 0 otherwise. */
  blockIdentCheck: passThrough<IdentArgs>('BlockIdentCheck', { ident: 'ident' }),

  countAirportOperations: passThrough<AirportArgs>('CountAirportOperations', { airport: 'airport' }),
  countAllEnrouteAirlineOperations: noArgs('CountAllEnrouteAirlineOperations'),

  /**
   * Navigation points along the planned route of a flight. Mostly limited to
   * flights within the continental US.
   */
  decodeFlightRoute: passThrough<FlightIdArgs>('DecodeFlightRoute', { faFlightId: 'faFlightID' }),
  decodeRoute: notImplemented('DecodeRoute'),

  /**
   * Airport boards. Arrived and Departed cover the last 24 hours, most
   * recent first; Enroute is ordered by estimated arrival; Scheduled covers
   * filed flights from two hours ago to a day ahead.
   */
  arrived: passThrough<AirportBoardArgs>('Arrived', AIRPORT_BOARD_FIELDS, PAGE_DEFAULTS),
  departed: passThrough<AirportBoardArgs>('Departed', AIRPORT_BOARD_FIELDS, PAGE_DEFAULTS),
  enroute: passThrough<AirportBoardArgs>('Enroute', AIRPORT_BOARD_FIELDS, PAGE_DEFAULTS),
  scheduled: passThrough<AirportBoardArgs>('Scheduled', AIRPORT_BOARD_FIELDS, PAGE_DEFAULTS),

  fleetArrived: notImplemented('FleetArrived'),
  fleetScheduled: notImplemented('FleetScheduled'),
  flightInfo: notImplemented('FlightInfo'),
  flightInfoEx: notImplemented('FlightInfoEx'),

  /**
   * faFlightID for an ident and a departure time that exactly matches the
   * actual or scheduled departure. First match wins.
   */
  getFlightId: passThrough<GetFlightIdArgs>('GetFlightID', {
    ident: 'ident',
    departureTime: timestampField('departureTime'),
  }),

  getHistoricalTrack: notImplemented('GetHistoricalTrack'),

  /** Track log of the current or most recent IFR flight of an ident. */
  getLastTrack: passThrough<IdentArgs>('GetLastTrack', { ident: 'ident' }),

  inboundFlightInfo: notImplemented('InboundFlightInfo'),

  /** Position, direction and speed of an airborne flight. */
  inFlightInfo: passThrough<IdentArgs>('InFlightInfo', { ident: 'ident' }),

  latLngToDistance: notImplemented('LatLongsToDistance'),
  latLngToHeading: notImplemented('LatLongsToHeading'),
  mapFlight: notImplemented('MapFlight'),
  mapFlightEx: notImplemented('MapFlightEx'),

  /** Latest raw METAR, possibly from a nearby airport. */
  metar: passThrough<AirportArgs>('Metar', { airport: 'airport' }),
  /** METAR in parsed, human-readable and raw form. */
  metarEx: passThrough<AirportArgs>('MetarEx', { airport: 'airport' }),
  ntaf: passThrough<AirportArgs>('NTaf', { airport: 'airport' }),
  taf: passThrough<AirportArgs>('Taf', { airport: 'airport' }),

  /**
   * Assigned IFR routings between two airports with counts and filed
   * altitudes.
   */
  routesBetweenAirports: passThrough<RouteArgs>('RoutesBetweenAirports', {
    origin: 'origin',
    destination: 'destination',
  }),
  routesBetweenAirportsEx: notImplemented('RoutesBetweenAirportsEx'),

  /**
   * Airborne aircraft matching `-key value` filters: prefix, type, suffix,
   * idents, destination, origin, originOrDestination, above/belowAltitude,
   * above/belowGroundspeed, latlong, filter and inAir. Codeshares are not
   * searched for idents.
   */
  search: encoded<SearchArgs>(
    'Search',
    ({ parameters = {}, howMany = MAX_RECORD_LENGTH, offset = 0 }) => ({
      query: buildSearchQuery(parameters),
      howMany,
      offset,
    })
  ),

  searchBirdseyeInFlight: notImplemented('SearchBirdseyeInFlight'),
  searchBirdseyePositions: notImplemented('SearchBirdseyePositions'),
  searchCount: notImplemented('SearchCount'),
  setMaximumResultSizes: notImplemented('SetMaximumResultSize'),

  /** Owner name, location and website of an aircraft. */
  tailOwner: passThrough<IdentArgs>('TailOwner', { ident: 'ident' }),

  zipcodeInfo: passThrough<ZipcodeArgs>('ZipcodeInfo', { zipcode: 'zipcode' }),

  /** Every flight alert scheduled for the account, website alerts included. */
  getAlerts: noArgs('GetAlerts'),

  /** Returns 1 on success. */
  deleteAlert: passThrough<DeleteAlertArgs>('DeleteAlert', { alertId: requiredField('alert_id') }),

  /**
   * Create or update a flight alert; resolves with the alert id.
   *
   * Rejections come back as strings starting with OVERLIMIT (too many
   * enabled alerts) or FLOODWARN (estimate exceeds `maxWeekly`); check them
   * with `remoteErrorOf`.
   */
  setAlert: passThrough<SetAlertArgs>(
    'SetAlert',
    {
      alertId: 'alert_id',
      ident: 'ident',
      origin: 'origin',
      destination: 'destination',
      aircraftType: 'aircrafttype',
      dateStart: 'date_start',
      dateEnd: 'date_end',
      channels: 'channels',
      enabled: 'enabled',
      maxWeekly: 'max_weekly',
    },
    { alertId: 0, enabled: true, maxWeekly: 1000 }
  ),

  /**
   * Where pushed alerts are delivered. Replaces any earlier endpoint; the
   * only format is "json/post".
   */
  registerAlertEndpoint: passThrough<RegisterAlertEndpointArgs>(
    'RegisterAlertEndpoint',
    { address: 'address', formatType: 'format_type' },
    { formatType: 'json/post' }
  ),
};
