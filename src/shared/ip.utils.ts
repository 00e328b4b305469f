/**
 * Canonical form of a socket's remote address for keying per-IP limits:
 * trimmed, without an IPv6 zone id and without the IPv4-mapped prefix.
 *
 * @example
 * normalizeIp('::ffff:192.168.1.1') // '192.168.1.1'
 * normalizeIp('fe80::1%eth0') // 'fe80::1'
 */
export function normalizeIp(ip: string | undefined): string | undefined {
  if (!ip) {
    return undefined;
  }

  let normalized = ip.trim();

  const zoneIndex = normalized.indexOf('%');
  if (zoneIndex >= 0) {
    normalized = normalized.slice(0, zoneIndex);
  }

  if (normalized.toLowerCase().startsWith('::ffff:') && normalized.includes('.')) {
    normalized = normalized.slice(7);
  }

  return normalized || undefined;
}
