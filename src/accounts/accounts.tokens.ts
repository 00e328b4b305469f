/**
 * Injection token for the IdentityResolver implementation.
 */
export const IDENTITY_RESOLVER = Symbol('IDENTITY_RESOLVER');
