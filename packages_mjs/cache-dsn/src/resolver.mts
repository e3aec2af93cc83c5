/**
 * DNS-backed resolvers: plain names (A + AAAA) and SRV indirection
 */

import { Resolver } from 'node:dns/promises';
import type { AddressResolver, DnsBackend, DnsResolverConfig, ServiceRecord } from './types.mjs';
import { DEFAULT_DNS_RESOLVER_CONFIG, isEmptyAnswer, uniqueAddresses } from './config.mjs';
import { PriorityFilter } from './priority-filter.mjs';

/**
 * Create a node:dns resolver bounded by the configured timeout
 */
export function createDnsBackend(config: DnsResolverConfig = {}): DnsBackend {
  const resolver = new Resolver({
    timeout: config.timeoutMs ?? DEFAULT_DNS_RESOLVER_CONFIG.timeoutMs,
    tries: config.tries ?? DEFAULT_DNS_RESOLVER_CONFIG.tries,
  });

  if (config.servers && config.servers.length > 0) {
    resolver.setServers(config.servers);
  }

  return resolver;
}

/**
 * Resolves a hostname to its A and AAAA addresses
 *
 * Both families are queried together. A family that answers ENODATA or
 * ENOTFOUND counts as empty, so a name with records in one family resolves to
 * those. Any other failure (timeout, SERVFAIL) rejects the call, as does an
 * empty answer in both families, with the IPv4 error. No retries happen here.
 *
 * @example
 * const resolver = new NameResolver(createDnsBackend({ timeoutMs: 2000 }));
 * const addresses = await resolver.resolve('db.internal');
 */
export class NameResolver implements AddressResolver {
  private readonly backend: DnsBackend;

  constructor(backend: DnsBackend = createDnsBackend()) {
    this.backend = backend;
  }

  async resolve(hostname: string): Promise<string[]> {
    const [v4, v6] = await Promise.allSettled([
      this.backend.resolve4(hostname),
      this.backend.resolve6(hostname),
    ]);

    for (const result of [v4, v6]) {
      if (result.status === 'rejected' && !isEmptyAnswer(result.reason)) {
        throw result.reason;
      }
    }

    if (v4.status === 'rejected' && v6.status === 'rejected') {
      throw v4.reason;
    }

    return uniqueAddresses([
      ...(v4.status === 'fulfilled' ? v4.value : []),
      ...(v6.status === 'fulfilled' ? v6.value : []),
    ]);
  }
}

/**
 * Resolves an SRV name to the addresses of its accepted targets
 *
 * Targets outside the priority window are dropped; weight and port are not
 * used. Ordering is left to the recency cache.
 */
export class ServiceRecordResolver implements AddressResolver {
  private readonly backend: DnsBackend;
  private readonly names: AddressResolver;
  private readonly filter: PriorityFilter;

  constructor(
    filter: PriorityFilter = new PriorityFilter(),
    backend: DnsBackend = createDnsBackend(),
    names: AddressResolver = new NameResolver(backend)
  ) {
    this.filter = filter;
    this.backend = backend;
    this.names = names;
  }

  /**
   * SRV answers whose priority falls inside the window
   */
  async targets(srvName: string): Promise<ServiceRecord[]> {
    const records = await this.backend.resolveSrv(srvName);
    return records.filter((record) => this.filter.withinThreshold(record.priority));
  }

  async resolve(srvName: string): Promise<string[]> {
    const targets = await this.targets(srvName);
    const addresses: string[] = [];

    for (const target of targets) {
      addresses.push(...(await this.names.resolve(target.name)));
    }

    return uniqueAddresses(addresses);
  }
}

export function createNameResolver(config?: DnsResolverConfig): NameResolver {
  return new NameResolver(createDnsBackend(config));
}

export function createServiceRecordResolver(
  filter: PriorityFilter,
  config?: DnsResolverConfig
): ServiceRecordResolver {
  return new ServiceRecordResolver(filter, createDnsBackend(config));
}
