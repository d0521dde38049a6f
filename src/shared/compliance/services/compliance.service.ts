import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CACHE_MANAGER } from '@nestjs/cache-manager';
import { Cache } from 'cache-manager';
import { fetch } from 'undici';
import robotsParser from 'robots-parser';
import { ComplianceVerdict } from '../interfaces/compliance-verdict.interface';
import { errorMessage } from '@/shared/lib/util';

/** Token matched against `User-agent` groups in robots.txt. */
export const ROBOTS_AGENT = 'PageSiftBot';

export const DEFAULT_POLICY_TIMEOUT_MS = 5000;
const POLICY_CACHE_TTL_MS = 60 * 60 * 1000;
const CACHE_PREFIX = 'robots:';

type PolicyLookup =
  | { available: true; content: string }
  | { available: false; reason: string };

/**
 * Reads a site's robots.txt and decides whether extraction may proceed.
 * Only a blanket disallow for this crawler (or `*`) denies; a missing or
 * unreachable policy allows.
 */
@Injectable()
export class ComplianceService {
  private readonly logger = new Logger(ComplianceService.name);
  private readonly userAgent: string;
  private readonly timeoutMs: number;

  constructor(
    @Inject(CACHE_MANAGER) private readonly cache: Cache,
    configService: ConfigService,
  ) {
    this.userAgent = configService.get<string>('USER_AGENT') || ROBOTS_AGENT;
    this.timeoutMs =
      configService.get<number>('ROBOTS_TIMEOUT_MS') || DEFAULT_POLICY_TIMEOUT_MS;
  }

  async check(url: string): Promise<ComplianceVerdict> {
    const checkedAt = new Date().toISOString();

    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return {
        allowed: true,
        reason: 'URL could not be parsed; no crawl policy consulted',
        policySource: null,
        crawlDelay: null,
        pathAllowed: true,
        checkedAt,
      };
    }

    const policySource = `${target.origin}/robots.txt`;
    const policy = await this.loadPolicy(target.origin, policySource);

    if (!policy.available) {
      return {
        allowed: true,
        reason: policy.reason,
        policySource,
        crawlDelay: null,
        pathAllowed: true,
        checkedAt,
      };
    }

    const robots = robotsParser(policySource, policy.content);
    const rootAllowed = robots.isAllowed(`${target.origin}/`, ROBOTS_AGENT);
    const pathAllowed = robots.isAllowed(target.toString(), ROBOTS_AGENT);
    const crawlDelay = robots.getCrawlDelay(ROBOTS_AGENT) ?? null;

    if (rootAllowed === false) {
      this.logger.log(`robots.txt of ${target.origin} disallows all crawling`);
      return {
        allowed: false,
        reason: 'robots.txt disallows all crawling for this agent',
        policySource,
        crawlDelay,
        pathAllowed: false,
        checkedAt,
      };
    }

    return {
      allowed: true,
      reason:
        pathAllowed === false
          ? 'robots.txt disallows this path but not the whole site'
          : 'robots.txt permits crawling',
      policySource,
      crawlDelay,
      pathAllowed: pathAllowed !== false,
      checkedAt,
    };
  }

  private async loadPolicy(
    origin: string,
    policySource: string,
  ): Promise<PolicyLookup> {
    const cacheKey = `${CACHE_PREFIX}${origin}`;
    const cached = await this.cache.get<string>(cacheKey);
    if (cached !== undefined && cached !== null) {
      return { available: true, content: cached };
    }

    const signal = AbortSignal.timeout(this.timeoutMs);
    try {
      const response = await fetch(policySource, {
        headers: { 'User-Agent': this.userAgent },
        redirect: 'follow',
        signal,
      });
      const content = await response.text();

      if (response.status >= 400) {
        return {
          available: false,
          reason: `No robots.txt published (HTTP ${response.status})`,
        };
      }

      await this.cache.set(cacheKey, content, POLICY_CACHE_TTL_MS);
      return { available: true, content };
    } catch (error) {
      const cause = signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : errorMessage(error);
      this.logger.warn(`Could not read ${policySource}: ${cause}`);
      return {
        available: false,
        reason: `robots.txt unavailable: ${cause}`,
      };
    }
  }
}
