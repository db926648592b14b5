/**
 * IPv4 CIDR parsing and canonicalization
 */

export const MIN_PREFIX_LENGTH = 8;
export const MAX_PREFIX_LENGTH = 32;

export type SubnetResult =
  | { ok: true; cidr: string }
  | { ok: false; reason: string };

const OCTET_PATTERN = /^\d{1,3}$/;

function parseAddress(text: string): number | null {
  const parts = text.split(".");
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!OCTET_PATTERN.test(part)) return null;
    const octet = Number.parseInt(part, 10);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

function formatAddress(value: number): string {
  return [
    Math.floor(value / 2 ** 24) % 256,
    Math.floor(value / 2 ** 16) % 256,
    Math.floor(value / 2 ** 8) % 256,
    value % 256,
  ].join(".");
}

/**
 * Parse a subnet and return it in canonical form.
 *
 * Host bits are cleared ("10.0.0.5/24" becomes "10.0.0.0/24") and a bare
 * address is treated as a /32. Prefixes outside [8, 32], multicast
 * (224.0.0.0/4) and reserved (240.0.0.0/4) networks are rejected.
 */
export function canonicalizeSubnet(input: string): SubnetResult {
  const text = input.trim();
  if (text === "") {
    return { ok: false, reason: "empty subnet" };
  }

  const [addressText = "", prefixText, ...rest] = text.split("/");
  if (rest.length > 0) {
    return { ok: false, reason: `invalid subnet '${text}'` };
  }

  const address = parseAddress(addressText);
  if (address === null) {
    return { ok: false, reason: `invalid IPv4 address '${addressText}'` };
  }

  let prefix = MAX_PREFIX_LENGTH;
  if (prefixText !== undefined) {
    if (!/^\d{1,2}$/.test(prefixText)) {
      return { ok: false, reason: `invalid prefix length '${prefixText}'` };
    }
    prefix = Number.parseInt(prefixText, 10);
  }

  if (prefix < MIN_PREFIX_LENGTH || prefix > MAX_PREFIX_LENGTH) {
    return {
      ok: false,
      reason: `prefix length must be between /${String(MIN_PREFIX_LENGTH)} and /${String(MAX_PREFIX_LENGTH)}`,
    };
  }

  const blockSize = 2 ** (MAX_PREFIX_LENGTH - prefix);
  const network = Math.floor(address / blockSize) * blockSize;

  // 224.0.0.0/4 and 240.0.0.0/4
  if (network >= 224 * 2 ** 24) {
    return {
      ok: false,
      reason: "multicast and reserved networks are not allowed",
    };
  }

  return { ok: true, cidr: `${formatAddress(network)}/${String(prefix)}` };
}

export function isValidSubnet(input: string): boolean {
  return canonicalizeSubnet(input).ok;
}
