/**
 * The recipient is not a `local@domain` address. Rejected before any lookup or write.
 */
export class AddressValidationError extends Error {
  readonly code = 'invalid_email';

  constructor(readonly address: string) {
    super(`Invalid recipient address: "${address}"`);
    this.name = 'AddressValidationError';
  }
}
