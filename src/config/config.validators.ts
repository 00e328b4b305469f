import { Logger } from '@nestjs/common';
import { MIN_TOKEN_SECRET_LENGTH } from './config.constants';

const logger = new Logger('ConfigValidation');

/**
 * Validates domain format using basic domain regex.
 *
 * Allows subdomains and TLDs with 2+ characters.
 */
export function isValidDomain(domain: string): boolean {
  // Matches: example.com, mail.example.com, sub.domain.example.org
  return /^(?:[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?\.)+[a-zA-Z]{2,}$/.test(domain);
}

export function isValidHostName(host: string): boolean {
  return host === 'localhost' || isValidDomain(host);
}

/**
 * Warns about a token secret that is too short to be useful.
 */
export function validateTokenSecret(secret: string): void {
  if (secret.length < MIN_TOKEN_SECRET_LENGTH) {
    logger.warn(
      `POSTLINE_TOKEN_SECRET is shorter than ${MIN_TOKEN_SECRET_LENGTH} characters. ` +
        'Use a long random value outside of local development.',
    );
  }
}
