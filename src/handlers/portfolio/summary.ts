import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { serializeSummary, successResponse } from '../../utils/http-response';
import { getPortfolioService } from '../service-context';

/**
 * Values every holding against live prices. Funds or cryptos whose provider
 * is down come back as stale placeholders rather than failing the request.
 */
const portfolioSummaryHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const startTime = Date.now();
  const portfolioService = await getPortfolioService();
  const summary = await portfolioService.getPortfolioSummary();

  console.log('[PORTFOLIO] Summary computed', {
    funds: summary.funds.assets.length,
    cryptos: summary.cryptos.assets.length,
    executionTime: `${Date.now() - startTime}ms`,
  });

  return successResponse(serializeSummary(summary));
};

export const handler = middy(portfolioSummaryHandler).use(errorHandler());
