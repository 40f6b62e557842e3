import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { HoldingType } from '../../types/common/enums';
import { serializeAssetClass, successResponse } from '../../utils/http-response';
import { getPortfolioService } from '../service-context';

const listFundsHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const portfolioService = await getPortfolioService();
  const funds = await portfolioService.getAssetClass(HoldingType.FUND);
  return successResponse(serializeAssetClass(funds));
};

export const handler = middy(listFundsHandler).use(errorHandler());
