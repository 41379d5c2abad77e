/**
 * CIDR containment and overlap over ip-num ranges.
 */

import { IPv4CidrRange, IPv6CidrRange } from "ip-num";

export function parseIPv4Cidr(cidr: string): IPv4CidrRange | null {
  try {
    return IPv4CidrRange.fromCidr(cidr);
  } catch {
    return null;
  }
}

export function parseIPv6Cidr(cidr: string): IPv6CidrRange | null {
  try {
    return IPv6CidrRange.fromCidr(cidr);
  } catch {
    return null;
  }
}

export function isValidCidr(cidr: string): boolean {
  return parseIPv4Cidr(cidr) !== null || parseIPv6Cidr(cidr) !== null;
}

type Containment = (inner: string, outer: string) => boolean | null;

/** `inner` within or equal to `outer`; null unless both parse in the same family. */
const contained: Containment = (inner, outer) => {
  const inner4 = parseIPv4Cidr(inner);
  const outer4 = parseIPv4Cidr(outer);
  if (inner4 && outer4) return inner4.isEquals(outer4) || inner4.inside(outer4);

  const inner6 = parseIPv6Cidr(inner);
  const outer6 = parseIPv6Cidr(outer);
  if (inner6 && outer6) return inner6.isEquals(outer6) || inner6.inside(outer6);

  return null;
};

/**
 * Whether a route destination covers `targetCidr`: the target is a
 * sub-network of, or identical to, the destination. "0.0.0.0/0" matches
 * anything. Unparseable input falls back to exact string equality; a valid
 * pair in different families never matches.
 */
export function cidrMatches(routeCidr: string, targetCidr: string): boolean {
  if (routeCidr === "0.0.0.0/0") return true;

  const result = contained(targetCidr, routeCidr);
  if (result !== null) return result;

  if (isValidCidr(routeCidr) && isValidCidr(targetCidr)) return false;
  return routeCidr === targetCidr;
}

/** Standard overlap. Malformed input and mixed families never overlap. */
export function cidrsOverlap(a: string, b: string): boolean {
  return contained(a, b) === true || contained(b, a) === true;
}
