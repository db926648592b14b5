/**
 * DNS lookup with a TTL cache, for the connection pool's connector
 */

import { lookup, type LookupAddress } from "node:dns";

import type { LookupFunction } from "node:net";

interface CacheEntry {
  addresses: LookupAddress[];
  expiresAt: number;
}

/**
 * Build a `net` lookup function that remembers resolved addresses for
 * `ttlMs`. A TTL of 0 disables caching.
 */
export function createCachedLookup(ttlMs: number): LookupFunction {
  const cache = new Map<string, CacheEntry>();

  return (hostname, options, callback) => {
    const key = `${hostname}|${String(options.family ?? 0)}`;

    const reply = (addresses: LookupAddress[]): void => {
      const [first] = addresses;
      if (first === undefined) {
        const error: NodeJS.ErrnoException = new Error(
          `No addresses found for ${hostname}`
        );
        error.code = "ENOTFOUND";
        callback(error, "");
        return;
      }
      if (options.all === true) {
        callback(null, addresses);
      } else {
        callback(null, first.address, first.family);
      }
    };

    const cached = cache.get(key);
    if (cached !== undefined && cached.expiresAt > Date.now()) {
      reply(cached.addresses);
      return;
    }

    lookup(
      hostname,
      { all: true, family: options.family, hints: options.hints },
      (error, addresses) => {
        if (error !== null) {
          callback(error, "");
          return;
        }
        if (ttlMs > 0) {
          cache.set(key, { addresses, expiresAt: Date.now() + ttlMs });
        }
        reply(addresses);
      }
    );
  };
}
