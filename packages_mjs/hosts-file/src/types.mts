/**
 * Type definitions for hosts-file
 */

/**
 * A parsed hosts file line
 */
export type HostsLine =
  /** Blank line or a line that starts with # */
  | { kind: 'comment'; raw: string }
  /** `<address> <hostname> [aliases...] [# comment]` */
  | { kind: 'entry'; raw: string; address: string; hostname: string }
  /** A non-comment line with fewer than two tokens */
  | { kind: 'invalid'; raw: string };

/**
 * Desired addresses for one hostname
 */
export interface HostsMapping {
  hostname: string;
  addresses: string[];
}

export interface HostsFileWriterConfig {
  /** Path of the hosts file. Default: /etc/hosts */
  path?: string;
  /** Clock for the AUTO GENERATED stamp. Default: () => new Date() */
  now?: () => Date;
}

export interface ReconcileResult {
  /** Hostnames whose address set differed from the file */
  changed: string[];
  /** Whether the file was written */
  written: boolean;
}
