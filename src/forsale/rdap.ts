/**
 * RDAP (Registration Data Access Protocol) Cross-Check.
 *
 * RFC 9083 - structured successor to WHOIS.
 * Looks for a "for sale" value in the domain object's status list.
 * Public API - no authentication required.
 *
 * Never fails a lookup: any failure becomes `{ tagPresent: false, reachable: false }`.
 */

import axios from 'axios';
import { z } from 'zod';
import type { RdapResult } from '../types.js';
import { DEFAULT_RDAP_BOOTSTRAP_URL } from '../config.js';
import { logger } from '../utils/logger.js';
import { createDeadline } from '../utils/timeout.js';

// ═══════════════════════════════════════════════════════════════════════════
// Zod Schemas for RDAP Response Validation
// ═══════════════════════════════════════════════════════════════════════════

const RdapDomainResponseSchema = z.object({
  objectClassName: z.literal('domain'),
  ldhName: z.string().optional(),
  status: z.array(z.string()).optional(),
}).passthrough(); // Allow additional RDAP fields

const RdapBootstrapSchema = z.object({
  services: z.array(
    z.tuple([z.array(z.string()), z.array(z.string())]).rest(z.unknown()),
  ),
}).passthrough();

/**
 * Normalised status value that marks a domain as for sale.
 */
export const FOR_SALE_STATUS = 'for sale';

/**
 * How long the IANA bootstrap file is reused.
 */
const BOOTSTRAP_TTL_MS = 60 * 60 * 1000;

/**
 * RDAP servers for common TLDs, used before the bootstrap file.
 */
const RDAP_SERVERS = new Map<string, string>(Object.entries({
  com: 'https://rdap.verisign.com/com/v1',
  net: 'https://rdap.verisign.com/net/v1',
  cc: 'https://rdap.verisign.com/cc/v1',
  tv: 'https://rdap.verisign.com/tv/v1',
  org: 'https://rdap.publicinterestregistry.org/rdap',
  dev: 'https://pubapi.registry.google/rdap',
  app: 'https://pubapi.registry.google/rdap',
  nl: 'https://rdap.sidn.nl',
  uk: 'https://rdap.nominet.uk/uk',
  ch: 'https://rdap.nic.ch',
  br: 'https://rdap.registro.br',
}));

export interface CrossCheckOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RdapCrossChecker {
  crossCheck(domain: string, options: CrossCheckOptions): Promise<RdapResult>;
}

export interface HttpRdapCheckerOptions {
  bootstrapUrl?: string;
}

const UNREACHABLE: RdapResult = { tagPresent: false, reachable: false };

/**
 * Normalise an RDAP status value: "For-Sale", "for_sale" and "for sale"
 * all compare equal.
 */
export function normalizeStatus(status: string): string {
  return status.trim().toLowerCase().replace(/[-_\s]+/g, ' ');
}

/**
 * Does a domain object's status list carry the for-sale tag?
 */
export function hasForSaleStatus(data: unknown): boolean {
  const parsed = RdapDomainResponseSchema.safeParse(data);
  if (!parsed.success) {
    logger.debug('RDAP response validation failed', {
      errors: parsed.error.errors.slice(0, 3), // Limit logged errors
    });
    return false;
  }
  return (parsed.data.status ?? []).some((s) => normalizeStatus(s) === FOR_SALE_STATUS);
}

export class HttpRdapChecker implements RdapCrossChecker {
  private readonly bootstrapUrl: string;
  private bootstrap: { servers: Map<string, string>; fetchedAt: number } | null = null;
  private bootstrapFetch: Promise<Map<string, string>> | null = null;

  constructor(options: HttpRdapCheckerOptions = {}) {
    this.bootstrapUrl = options.bootstrapUrl ?? DEFAULT_RDAP_BOOTSTRAP_URL;
  }

  async crossCheck(domain: string, options: CrossCheckOptions): Promise<RdapResult> {
    const deadline = createDeadline(options.timeoutMs, options.signal);

    try {
      const server = await this.getRdapServer(domain, options.timeoutMs);
      if (!server) {
        logger.debug('No RDAP server for domain', { domain });
        return UNREACHABLE;
      }

      const url = `${server.replace(/\/+$/, '')}/domain/${domain}`;
      const response = await axios.get<unknown>(url, {
        timeout: options.timeoutMs,
        signal: deadline.signal,
        headers: { Accept: 'application/rdap+json' },
        validateStatus: () => true,
      });

      // 404 = registry answered, domain unknown to it
      if (response.status === 404) {
        return { tagPresent: false, reachable: true };
      }

      if (response.status !== 200) {
        logger.debug('RDAP unexpected response', { domain, status: response.status });
        return UNREACHABLE;
      }

      return { tagPresent: hasForSaleStatus(response.data), reachable: true };
    } catch (error) {
      logger.debug('RDAP cross-check failed', {
        domain,
        timed_out: deadline.timedOut(),
        error: error instanceof Error ? error.message : String(error),
      });
      return UNREACHABLE;
    } finally {
      deadline.clear();
    }
  }

  /**
   * RDAP base URL for a domain: built-in table first, then the IANA
   * bootstrap file, matching the longest registered suffix.
   */
  private async getRdapServer(domain: string, timeoutMs: number): Promise<string | null> {
    const labels = domain.split('.');
    const tld = labels[labels.length - 1];

    const known = RDAP_SERVERS.get(tld);
    if (known) {
      return known;
    }

    const servers = await this.loadBootstrap(timeoutMs);
    for (let i = 0; i < labels.length; i++) {
      const server = servers.get(labels.slice(i).join('.'));
      if (server) return server;
    }
    return null;
  }

  /**
   * Concurrent callers share one fetch, so it carries no caller's signal;
   * each caller stays bounded by its own stage timeout.
   */
  private loadBootstrap(timeoutMs: number): Promise<Map<string, string>> {
    if (this.bootstrap && Date.now() - this.bootstrap.fetchedAt < BOOTSTRAP_TTL_MS) {
      return Promise.resolve(this.bootstrap.servers);
    }

    if (!this.bootstrapFetch) {
      this.bootstrapFetch = this.fetchBootstrap(timeoutMs).finally(() => {
        this.bootstrapFetch = null;
      });
    }
    return this.bootstrapFetch;
  }

  private async fetchBootstrap(timeoutMs: number): Promise<Map<string, string>> {
    const response = await axios.get<unknown>(this.bootstrapUrl, { timeout: timeoutMs });

    const parsed = RdapBootstrapSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error('Malformed RDAP bootstrap file');
    }

    const servers = new Map<string, string>();
    for (const [suffixes, urls] of parsed.data.services) {
      const server = urls.find((u) => u.startsWith('https://')) ?? urls[0];
      if (!server) continue;
      for (const suffix of suffixes) {
        servers.set(suffix.toLowerCase(), server);
      }
    }

    this.bootstrap = { servers, fetchedAt: Date.now() };
    return servers;
  }
}
