import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { validateInput } from '../../middleware/zod-error-handler';
import { HoldingType } from '../../types/common/enums';
import { fundParamsSchema } from '../../types/schemas/handlers';
import { serializeAsset, successResponse } from '../../utils/http-response';
import { getPortfolioService } from '../service-context';

const getFundHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { code } = validateInput(fundParamsSchema, event.pathParameters ?? {});

  const portfolioService = await getPortfolioService();
  const fund = await portfolioService.getAsset(HoldingType.FUND, code);
  return successResponse(serializeAsset(fund));
};

export const handler = middy(getFundHandler).use(errorHandler());
