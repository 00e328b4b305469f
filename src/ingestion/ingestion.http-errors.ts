import { BadRequestException, HttpException, InternalServerErrorException } from '@nestjs/common';
import { PersistenceError } from '../threads/thread-store.errors';
import { AddressValidationError } from './ingestion.errors';

/**
 * Maps delivery pipeline errors to HTTP responses with `{ error, message }` bodies.
 * Anything unrecognised is returned unchanged.
 */
export function toHttpException(error: unknown): unknown {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof AddressValidationError) {
    return new BadRequestException({ error: error.code, message: error.message });
  }
  if (error instanceof PersistenceError) {
    return new InternalServerErrorException({ error: 'persistence_failed', message: 'Failed to send message' });
  }
  return error;
}
