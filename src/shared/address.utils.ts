export interface ParsedAddress {
  localPart: string;
  domain: string;
}

/**
 * Splits `local@domain`. Returns undefined unless the address holds exactly
 * one `@` with a non-empty part on each side.
 */
export function parseAddress(address: string): ParsedAddress | undefined {
  const parts = address.trim().split('@');
  if (parts.length !== 2) {
    return undefined;
  }

  const [localPart, domain] = parts;
  if (!localPart || !domain) {
    return undefined;
  }

  return { localPart, domain: domain.toLowerCase() };
}
