import { z } from 'zod';

/**
 * JSON values as returned by the service
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

/**
 * Wire params: the form fields of one request
 */
export type WireValue = string | number | boolean | string[];

export type WireParams = Record<string, WireValue>;

/**
 * Conventional upper bound for `howMany` unless the account has negotiated
 * a larger result size
 */
export const MAX_RECORD_LENGTH = 15;

/**
 * Traffic filter for the airport boards.
 * `ALL` sends nothing, which the service reads as all traffic.
 */
export const TrafficFilter = {
  GA: 'ga',
  AIRLINE: 'airline',
  ALL: undefined,
} as const;
export type TrafficFilter = (typeof TrafficFilter)[keyof typeof TrafficFilter];

/**
 * Report kinds accepted by AirlineInsight
 */
export const AirlineInsightReportType = {
  /** Alternate route popularity with fares */
  ALTERNATE_ROUTE_POPULARITY: 1,
  /** Percentage of scheduled flights that are actually flown */
  PERCENTAGE_SCHEDULED_ACTUALLY_FLOWN: 2,
  /** Passenger load factor of flights that are actually flown */
  PASSENGER_LOAD_FACTOR_ACTUALLY_FLOWN: 3,
  /** Carriers by most cargo weight */
  CARRIERS_BY_CARGO_WEIGHT: 4,
} as const;
export type AirlineInsightReportType =
  (typeof AirlineInsightReportType)[keyof typeof AirlineInsightReportType];

/**
 * Airline flight schedule record
 */
export const AirlineFlightScheduleSchema = z
  .object({
    ident: z.string().optional(),
    actual_ident: z.string().optional(),
    departuretime: z.number(),
    arrivaltime: z.number(),
    origin: z.string().optional(),
    destination: z.string().optional(),
    aircrafttype: z.string().optional(),
    meal_service: z.string().optional(),
    seats_cabin_first: z.number().optional(),
    seats_cabin_business: z.number().optional(),
    seats_cabin_coach: z.number().optional(),
  })
  .passthrough();

export type AirlineFlightSchedule = z.infer<typeof AirlineFlightScheduleSchema>;

export type ScheduledFlight = AirlineFlightSchedule & {
  departure_time: Date;
  arrival_time: Date;
};

/**
 * Method arguments
 */
export interface AircraftTypeArgs {
  aircraftType: string;
}

export interface FlightIdArgs {
  /** unique identifier assigned by the service (or "ident@departureTime") */
  faFlightId: string;
}

export interface IdentArgs {
  ident: string;
}

export interface AirportArgs {
  airport: string;
}

export interface AirlineArgs {
  airline: string;
}

export interface RouteArgs {
  origin: string;
  destination: string;
}

export interface PageArgs {
  howMany?: number;
  offset?: number;
}

export interface AirportBoardArgs extends PageArgs {
  airport: string;
  filter?: TrafficFilter;
}

export interface AirlineFlightSchedulesArgs extends PageArgs {
  startDate: Date;
  endDate: Date;
  origin?: string;
  destination?: string;
  airline?: string;
  flightNumber?: string;
}

export interface AirlineInsightArgs extends RouteArgs {
  reportType?: AirlineInsightReportType;
}

export interface GetFlightIdArgs {
  ident: string;
  departureTime: Date;
}

/**
 * Search filters, e.g. `{ type: 'B77*', belowAltitude: 100 }`.
 * Keys are sent in insertion order.
 */
export type SearchFilters = Record<string, string | number>;

export interface SearchArgs extends PageArgs {
  parameters?: SearchFilters;
}

export interface ZipcodeArgs {
  zipcode: string;
}

export interface DeleteAlertArgs {
  alertId: number;
}

export interface SetAlertArgs {
  /** 0 creates, -1 upserts by ident, anything else updates that alert */
  alertId?: number;
  ident?: string;
  origin?: string;
  destination?: string;
  aircraftType?: string;
  /** epoch seconds, rounded to a whole day by the service; 0 with dateEnd 0 recurs */
  dateStart?: number;
  dateEnd?: number;
  /** e.g. `['{16 e_filed e_departure e_arrival}']` */
  channels?: string[];
  enabled?: boolean;
  maxWeekly?: number;
}

export interface RegisterAlertEndpointArgs {
  address: string;
  formatType?: string;
}
