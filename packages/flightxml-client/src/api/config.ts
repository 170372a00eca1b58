import { z } from 'zod';
import { ValidationError } from '../types/client';
import type { FlightXmlClientConfig } from '../types/client';

const EnvConfigSchema = z.object({
  FLIGHTXML_USERNAME: z.string().min(1),
  FLIGHTXML_API_KEY: z.string().min(1),
  FLIGHTXML_BASE_URL: z.string().url().optional(),
  FLIGHTXML_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/**
 * Read client configuration from environment variables
 *
 * - FLIGHTXML_USERNAME (required)
 * - FLIGHTXML_API_KEY (required)
 * - FLIGHTXML_BASE_URL
 * - FLIGHTXML_TIMEOUT_MS
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): FlightXmlClientConfig {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ValidationError(`Invalid FlightXML configuration: ${fields}`, parsed.error.issues);
  }

  return {
    username: parsed.data.FLIGHTXML_USERNAME,
    apiKey: parsed.data.FLIGHTXML_API_KEY,
    baseUrl: parsed.data.FLIGHTXML_BASE_URL,
    requestTimeoutMs: parsed.data.FLIGHTXML_TIMEOUT_MS,
  };
}
