import { isIP } from "node:net";
import type { AddressRecordKind } from "./types.js";

/**
 * Expand an IPv6 address to eight zero-padded lowercase groups so that
 * different spellings of the same address compare equal.
 */
function expandIPv6(ip: string): string {
  let value = ip.toLowerCase();

  // Trailing dotted quad (::ffff:192.0.2.1) becomes two hex groups
  const dotted = value.match(/^(.*:)(\d+)\.(\d+)\.(\d+)\.(\d+)$/);
  if (dotted) {
    const [a, b, c, d] = dotted.slice(2).map(Number);
    value = `${dotted[1]}${((a << 8) | b).toString(16)}:${((c << 8) | d).toString(16)}`;
  }

  const halves = value.split("::");
  let groups: string[];
  if (halves.length === 2) {
    const left = halves[0] ? halves[0].split(":") : [];
    const right = halves[1] ? halves[1].split(":") : [];
    const fill = Array<string>(8 - left.length - right.length).fill("0");
    groups = [...left, ...fill, ...right];
  } else {
    groups = value.split(":");
  }

  return groups.map((g) => g.padStart(4, "0")).join(":");
}

/** Comparison key for an address. IPv4 and non-addresses are only trimmed. */
export function canonicalAddress(address: string): string {
  const value = address.trim();
  return isIP(value) === 6 ? expandIPv6(value) : value;
}

export function recordKindFor(address: string): AddressRecordKind {
  return isIP(address.trim()) === 6 ? "AAAA" : "A";
}
