import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { HoldingType } from '../../types/common/enums';
import { serializeAssetClass, successResponse } from '../../utils/http-response';
import { getPortfolioService } from '../service-context';

const listCryptoHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const portfolioService = await getPortfolioService();
  const cryptos = await portfolioService.getAssetClass(HoldingType.CRYPTO);
  return successResponse(serializeAssetClass(cryptos));
};

export const handler = middy(listCryptoHandler).use(errorHandler());
