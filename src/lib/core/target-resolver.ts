import { ConfigurationError } from "../utils/errors.ts";
import { logger, LogEventType } from "../utils/logger.ts";

/**
 * Environment variable holding the device address
 */
export const PAPER_IP_ENV = "PAPER_IP";

/**
 * Environment variable holding the Stadia Maps API key
 */
export const STADIA_API_KEY_ENV = "STADIA_API_KEY";

/**
 * Device address, resolved once per invocation
 */
export interface Endpoint {
  readonly host: string;
}

function firstNonEmpty(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

/**
 * Resolve the device endpoint from `--ip`, falling back to PAPER_IP.
 *
 * @throws ConfigurationError when neither is set
 */
export function resolveEndpoint(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): Endpoint {
  const host = firstNonEmpty(explicit, env[PAPER_IP_ENV]);
  if (!host) {
    throw new ConfigurationError(
      `Device IP must be provided via --ip or ${PAPER_IP_ENV} environment variable.`,
    );
  }

  logger.debug(`Using device at ${host}`, LogEventType.ENDPOINT_RESOLVED, {
    host,
  });
  return Object.freeze({ host });
}

/**
 * Resolve the map API key from `--api-key`, falling back to STADIA_API_KEY.
 *
 * @throws ConfigurationError when neither is set
 */
export function resolveApiKey(
  explicit: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const key = firstNonEmpty(explicit, env[STADIA_API_KEY_ENV]);
  if (!key) {
    throw new ConfigurationError(
      `Stadia Maps API key required. Set via --api-key or ${STADIA_API_KEY_ENV} environment variable.`,
    );
  }
  return key;
}

/**
 * Base URL of the device HTTP API
 */
export function apiBaseUrl(endpoint: Endpoint): string {
  return `http://${endpoint.host}/api`;
}
