import { BOOLEAN_TRUE_VALUES } from './config.constants';
import { isValidHostName } from './config.validators';

export function parseOptionalBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (BOOLEAN_TRUE_VALUES.includes(normalized)) {
    return true;
  }

  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return defaultValue;
}

export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  // Ports, timeouts and sizes are all whole numbers
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Parses a string environment variable with a default value.
 *
 * @param value - The string value to parse
 * @param defaultValue - Returned when the value is missing or empty
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Parses the host name this server answers for.
 *
 * The value is compared against the domain part of recipient addresses,
 * so it is trimmed and lowercased.
 *
 * @throws {Error} If the value is neither `localhost` nor a dotted domain
 * @example
 * ```
 * POSTLINE_SERVER_HOST=Mail.Example.com
 * // Returns: 'mail.example.com'
 * ```
 */
export function parseServerHost(value: string | undefined, defaultValue: string): string {
  const host = parseStringWithDefault(value?.trim(), defaultValue).toLowerCase();

  if (!isValidHostName(host)) {
    throw new Error(`Invalid POSTLINE_SERVER_HOST: "${host}". Must be "localhost" or a domain like "mail.example.com"`);
  }

  return host;
}
