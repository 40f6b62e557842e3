import { PortfolioService } from '../services/portfolio-service';
import { registerShutdownHooks } from '../services/providers/provider-registry';

let portfolioService: Promise<PortfolioService> | undefined;

/**
 * Portfolio service shared by the invocations of a warm container, so provider
 * caches and the browser session survive between requests
 */
export const getPortfolioService = (): Promise<PortfolioService> => {
  if (!portfolioService) {
    registerShutdownHooks();
    portfolioService = PortfolioService.initialize().catch((error: unknown) => {
      portfolioService = undefined;
      throw error;
    });
  }
  return portfolioService;
};

export const resetPortfolioService = (): void => {
  portfolioService = undefined;
};
