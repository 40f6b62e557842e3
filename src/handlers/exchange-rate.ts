import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../middleware/error-handler';
import { serializeExchangeRate, successResponse } from '../utils/http-response';
import { getPortfolioService } from './service-context';

const exchangeRateHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const portfolioService = await getPortfolioService();
  const rate = await portfolioService.getExchangeRate();

  console.log('[EXCHANGE RATE] Served rate', { from: rate.from, to: rate.to, rate: rate.rate });
  return successResponse(serializeExchangeRate(rate));
};

export const handler = middy(exchangeRateHandler).use(errorHandler());
