import { DomainStrategyService } from './domain-strategy.service';
import { RenderMode } from '@/shared/scraping/enums/render-mode.enum';

describe('DomainStrategyService', () => {
  const service = new DomainStrategyService();

  it('uses the configured mode for a listed domain', () => {
    expect(service.getRenderMode('https://www.linkedin.com/jobs')).toBe(
      RenderMode.RENDER,
    );
  });

  it('lets subdomains inherit their parent entry', () => {
    expect(service.getRenderMode('https://en.m.wikipedia.org/wiki/X')).toBe(
      RenderMode.STATIC,
    );
    expect(service.getRenderMode('https://mobile.twitter.com/home')).toBe(
      RenderMode.RENDER,
    );
  });

  it('defaults to static for unknown domains', () => {
    expect(service.getRenderMode('http://example.test:8080/page')).toBe(
      RenderMode.STATIC,
    );
  });
});
