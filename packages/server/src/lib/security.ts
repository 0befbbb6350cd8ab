/**
 * Security utilities: SSRF protection for outbound image fetches.
 */

import net, { type LookupFunction } from "node:net";
import dns from "node:dns/promises";
import { PipelineError } from "./errors.js";

export interface ResolvedAddress {
  address: string;
  family: number;
}

/** Resolves every address a hostname maps to. Swappable in tests. */
export type LookupFn = (hostname: string) => Promise<ResolvedAddress[]>;

export const systemLookup: LookupFn = (hostname) => dns.lookup(hostname, { all: true, verbatim: true });

/**
 * Check if a hostname belongs to an internal name or a private/reserved
 * address literal. Resolved names go through isPrivateAddress() instead.
 */
export function isPrivateHostname(hostname: string): boolean {
  const lower = hostname.toLowerCase().replace(/\.$/, "");
  if (
    lower === "localhost" ||
    lower.endsWith(".localhost") ||
    lower.endsWith(".local") ||
    lower.endsWith(".internal")
  ) {
    return true;
  }

  const literal = lower.replace(/^\[|\]$/g, "");
  if (net.isIP(literal)) {
    return isPrivateAddress(literal);
  }
  return false;
}

/** True for loopback, private, link-local and other non-public addresses. */
export function isPrivateAddress(address: string): boolean {
  if (net.isIPv4(address)) return isPrivateIPv4(address);
  if (net.isIPv6(address)) return isPrivateIPv6(address);
  // Not an IP at all: refuse rather than guess.
  return true;
}

function isPrivateIPv4(ip: string): boolean {
  const parts = ip.split(".").map(Number);
  if (parts.length !== 4) return false;
  const [a, b, c] = parts;

  // 0.0.0.0/8
  if (a === 0) return true;
  // 10.0.0.0/8
  if (a === 10) return true;
  // 100.64.0.0/10 (carrier-grade NAT)
  if (a === 100 && b >= 64 && b <= 127) return true;
  // 127.0.0.0/8
  if (a === 127) return true;
  // 169.254.0.0/16 (link-local / cloud metadata)
  if (a === 169 && b === 254) return true;
  // 172.16.0.0/12
  if (a === 172 && b >= 16 && b <= 31) return true;
  // 192.0.0.0/24 (IETF protocol assignments)
  if (a === 192 && b === 0 && c === 0) return true;
  // 192.168.0.0/16
  if (a === 192 && b === 168) return true;
  // 198.18.0.0/15 (benchmarking)
  if (a === 198 && (b === 18 || b === 19)) return true;
  // 224.0.0.0/4 (multicast) and 240.0.0.0/4 (reserved)
  if (a >= 224) return true;

  return false;
}

/** Expand an IPv6 literal into its eight 16-bit groups. */
function ipv6Groups(ip: string): number[] | null {
  let text = ip.toLowerCase().split("%")[0];

  // Trailing dotted quad (::ffff:1.2.3.4) becomes two hex groups.
  const dotted = text.match(/(\d+\.\d+\.\d+\.\d+)$/);
  if (dotted) {
    const octets = dotted[1].split(".").map(Number);
    const hi = ((octets[0] << 8) | octets[1]).toString(16);
    const lo = ((octets[2] << 8) | octets[3]).toString(16);
    text = text.slice(0, -dotted[1].length) + `${hi}:${lo}`;
  }

  const [head, tail] = text.split("::");
  const headGroups = head ? head.split(":") : [];
  const tailGroups = tail ? tail.split(":") : [];
  const missing = 8 - headGroups.length - tailGroups.length;
  if (text.includes("::") ? missing < 0 : missing !== 0) return null;

  const groups = [...headGroups, ...new Array<string>(missing).fill("0"), ...tailGroups].map((g) =>
    parseInt(g, 16),
  );
  return groups.length === 8 && groups.every((g) => Number.isInteger(g)) ? groups : null;
}

function isPrivateIPv6(ip: string): boolean {
  const groups = ipv6Groups(ip);
  if (!groups) return true;

  const [first] = groups;
  const upperZero = groups.slice(0, 5).every((g) => g === 0);

  // :: and ::1
  if (upperZero && groups[5] === 0 && groups[6] === 0 && (groups[7] === 0 || groups[7] === 1)) {
    return true;
  }
  // ::ffff:a.b.c.d (IPv4-mapped): judge the embedded IPv4 address
  if (upperZero && groups[5] === 0xffff) {
    const v4 = [groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff].join(".");
    return isPrivateIPv4(v4);
  }
  // fc00::/7 (unique local)
  if ((first & 0xfe00) === 0xfc00) return true;
  // fe80::/10 (link-local)
  if ((first & 0xffc0) === 0xfe80) return true;
  // ff00::/8 (multicast)
  if ((first & 0xff00) === 0xff00) return true;

  return false;
}

/**
 * Resolve a hostname via DNS and verify none of the addresses it maps to
 * are private/internal. Runs before every connection so a public name
 * cannot be rebound onto an internal address between hops.
 */
export async function assertPublicDestination(hostname: string, lookup: LookupFn = systemLookup): Promise<void> {
  const bare = hostname.replace(/^\[|\]$/g, "");
  if (isPrivateHostname(bare)) {
    throw new PipelineError("ForbiddenDestination", `requests to ${hostname} are not allowed`);
  }
  if (net.isIP(bare)) return;

  let addresses: ResolvedAddress[];
  try {
    addresses = await lookup(bare);
  } catch (err) {
    throw new PipelineError("InvalidSource", `could not resolve ${hostname}`, { cause: err });
  }
  if (addresses.length === 0) {
    throw new PipelineError("InvalidSource", `could not resolve ${hostname}`);
  }

  for (const { address } of addresses) {
    if (isPrivateAddress(address)) {
      throw new PipelineError(
        "ForbiddenDestination",
        `${hostname} resolves to private address ${address}`,
      );
    }
  }
}

/**
 * A socket `lookup` that refuses private addresses. The pre-connect check
 * and the connection resolve separately, so the connection checks again.
 */
export function guardedLookup(lookup: LookupFn = systemLookup): LookupFunction {
  return (hostname, options, callback) => {
    void lookup(hostname).then(
      (resolved) => {
        const addresses = options.family === 4 || options.family === 6
          ? resolved.filter((entry) => entry.family === options.family)
          : resolved;
        const blocked = addresses.find((entry) => isPrivateAddress(entry.address));
        if (blocked) {
          callback(
            new PipelineError("ForbiddenDestination", `${hostname} resolves to private address ${blocked.address}`),
            "",
          );
          return;
        }
        const [first] = addresses;
        if (!first) {
          callback(new PipelineError("InvalidSource", `could not resolve ${hostname}`), "");
          return;
        }
        if (options.all) callback(null, addresses);
        else callback(null, first.address, first.family);
      },
      (err: unknown) => {
        callback(new PipelineError("InvalidSource", `could not resolve ${hostname}`, { cause: err }), "");
      },
    );
  };
}
