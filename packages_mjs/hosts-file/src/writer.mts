/**
 * Hosts file writer - rewrites the file only for hostnames whose addresses changed
 */

import fs from 'fs-extra';
import type { HostsFileWriterConfig, HostsMapping, ReconcileResult } from './types.mjs';
import { diffMappings, rewriteHosts } from './parser.mjs';

export const DEFAULT_HOSTS_PATH = '/etc/hosts';

export class HostsFileWriter {
  readonly path: string;
  private readonly now: () => Date;

  constructor(config: HostsFileWriterConfig = {}) {
    this.path = config.path ?? DEFAULT_HOSTS_PATH;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Current file content; a missing file reads as empty
   */
  async read(): Promise<string> {
    if (!(await fs.pathExists(this.path))) return '';
    return fs.readFile(this.path, 'utf-8');
  }

  /**
   * Read the file once, apply every changed mapping and write once if
   * anything changed. Comparison is by address set, so reordering alone is
   * not a change.
   */
  async reconcile(mappings: HostsMapping[]): Promise<ReconcileResult> {
    const original = await this.read();
    const changed = diffMappings(original, mappings);

    if (changed.length === 0) {
      return { changed, written: false };
    }

    const timestamp = this.now();
    let content = original;
    for (const mapping of mappings) {
      if (changed.includes(mapping.hostname)) {
        content = rewriteHosts(content, mapping.hostname, mapping.addresses, timestamp);
      }
    }

    await fs.writeFile(this.path, content, 'utf-8');
    return { changed, written: true };
  }
}

export function createHostsFileWriter(config?: HostsFileWriterConfig): HostsFileWriter {
  return new HostsFileWriter(config);
}
