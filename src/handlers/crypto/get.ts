import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { validateInput } from '../../middleware/zod-error-handler';
import { HoldingType } from '../../types/common/enums';
import { cryptoParamsSchema } from '../../types/schemas/handlers';
import { serializeAsset, successResponse } from '../../utils/http-response';
import { getPortfolioService } from '../service-context';

const getCryptoHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { symbol } = validateInput(cryptoParamsSchema, event.pathParameters ?? {});

  const portfolioService = await getPortfolioService();
  const crypto = await portfolioService.getAsset(HoldingType.CRYPTO, symbol);
  return successResponse(serializeAsset(crypto));
};

export const handler = middy(getCryptoHandler).use(errorHandler());
