import { z } from 'zod';
import { ValidationError } from '../types/client';

const WireTimestampInputSchema = z.date({
  invalid_type_error: 'timestamp must be a Date',
});

/**
 * Converts a Date into whole seconds since 1970-01-01T00:00:00Z.
 *
 * An absent value stays absent so the field is left out of the request.
 * Fractional seconds are truncated toward zero. Numbers, strings and
 * invalid dates are rejected; callers convert those themselves.
 */
export function toWireTimestamp(value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  const parsed = WireTimestampInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues[0]?.message ?? 'timestamp must be a Date',
      parsed.error.issues
    );
  }

  return Math.trunc(parsed.data.getTime() / 1000);
}

/**
 * Converts epoch seconds from the wire into a Date.
 *
 * The Date holds the absolute instant; it renders in the local time zone of
 * the running process.
 */
export function fromWireTimestamp(seconds: number): Date {
  return new Date(seconds * 1000);
}
