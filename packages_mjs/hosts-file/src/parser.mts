/**
 * Hosts file parsing, diffing and rendering
 */

import type { HostsLine, HostsMapping } from './types.mjs';

export const AUTO_GENERATED_MARKER = 'AUTO GENERATED';

/**
 * Split content into lines. A trailing newline does not produce an extra
 * empty line.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

export function parseHostsLine(raw: string): HostsLine {
  const trimmed = raw.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return { kind: 'comment', raw };
  }

  const hashIndex = trimmed.indexOf('#');
  const body = hashIndex >= 0 ? trimmed.slice(0, hashIndex) : trimmed;
  const [address, hostname] = body.trim().split(/\s+/);

  if (!address || !hostname) {
    return { kind: 'invalid', raw };
  }

  return { kind: 'entry', raw, address, hostname };
}

export function parseHosts(content: string): HostsLine[] {
  return splitLines(content).map(parseHostsLine);
}

/**
 * Addresses currently mapped to a hostname, in file order
 */
export function addressesFor(content: string, hostname: string): string[] {
  const addresses: string[] = [];
  for (const line of parseHosts(content)) {
    if (line.kind === 'entry' && line.hostname === hostname && !addresses.includes(line.address)) {
      addresses.push(line.address);
    }
  }
  return addresses;
}

export function sameAddressSet(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((address) => right.has(address));
}

/**
 * Hostnames whose desired address set differs from what the content maps
 */
export function diffMappings(content: string, mappings: HostsMapping[]): string[] {
  return mappings
    .filter((mapping) => !sameAddressSet(addressesFor(content, mapping.hostname), mapping.addresses))
    .map((mapping) => mapping.hostname);
}

export function formatEntry(address: string, hostname: string, timestamp: Date): string {
  return `${address} ${hostname} # ${AUTO_GENERATED_MARKER}: ${timestamp.toISOString()}`;
}

/**
 * Replace every entry for a hostname with one line per address
 *
 * Comment lines and entries for other hostnames are kept byte for byte, in
 * order; the new entries are appended at the end.
 */
export function rewriteHosts(
  content: string,
  hostname: string,
  addresses: string[],
  timestamp: Date = new Date()
): string {
  const kept = parseHosts(content)
    .filter((line) => !(line.kind === 'entry' && line.hostname === hostname))
    .map((line) => line.raw);

  const added = addresses.map((address) => formatEntry(address, hostname, timestamp));
  const lines = [...kept, ...added];

  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
