/**
 * Express "trust proxy" value from TRUST_PROXY
 *
 * - "" / "false" / "0": trust nothing, req.ip is the socket address
 * - "2": trust that many hops from the right of X-Forwarded-For
 * - "loopback, 10.0.0.0/8": trust these addresses or subnets
 */
export type TrustProxySetting = false | number | string[];

export function parseTrustProxy(value: string): TrustProxySetting {
  const trimmed = value.trim();
  if (trimmed === '' || trimmed === 'false' || trimmed === '0') {
    return false;
  }
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  return trimmed
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
