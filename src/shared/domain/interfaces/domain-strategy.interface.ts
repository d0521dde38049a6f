import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';

export interface DomainStrategyConfig {
  [domain: string]: RenderMode;
}

export interface IStrategyResolver {
  getRenderMode(url: string): RenderMode;
}
