import { Injectable, Logger } from '@nestjs/common';
import {
  isRenderMode,
  RenderMode,
} from '@/shared/scraping/enums/render-mode.enum';
import {
  DomainStrategyConfig,
  IStrategyResolver,
} from '../interfaces/domain-strategy.interface';
import renderStrategies from '../config/render-strategies.json';

@Injectable()
export class DomainStrategyService implements IStrategyResolver {
  private readonly logger = new Logger(DomainStrategyService.name);
  private readonly strategyMap: DomainStrategyConfig;
  private readonly defaultMode = RenderMode.STATIC;

  constructor() {
    this.strategyMap = DomainStrategyService.toConfig(renderStrategies);
    this.logger.log(
      `Loaded ${Object.keys(this.strategyMap).length} domain render strategies`,
    );
  }

  /**
   * Render mode for a URL when the caller did not pick one. Subdomains
   * inherit the entry of their parent domain.
   */
  getRenderMode(url: string): RenderMode {
    let domain = this.normalizeDomain(url);

    while (domain.includes('.')) {
      const mode = this.strategyMap[domain];
      if (mode) {
        this.logger.debug(`Domain ${domain} → ${mode}`);
        return mode;
      }
      domain = domain.slice(domain.indexOf('.') + 1);
    }

    return this.defaultMode;
  }

  private normalizeDomain(url: string): string {
    return url
      .toLowerCase()
      .replace(/^https?:\/\//, '')
      .replace(/^www\./, '')
      .split('/')[0]
      .split(':')[0];
  }

  private static toConfig(raw: Record<string, string>): DomainStrategyConfig {
    const config: DomainStrategyConfig = {};
    for (const [domain, mode] of Object.entries(raw)) {
      if (isRenderMode(mode)) {
        config[domain] = mode;
      }
    }
    return config;
  }
}
