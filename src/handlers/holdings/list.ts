import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { validateInput } from '../../middleware/zod-error-handler';
import { HoldingRepository } from '../../repositories/holding-repository';
import { listHoldingsQuerySchema } from '../../types/schemas/handlers';
import { serializeHolding, successResponse } from '../../utils/http-response';

const listHoldingsHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { type } = validateInput(listHoldingsQuerySchema, event.queryStringParameters ?? {});

  const holdingRepository = await HoldingRepository.initialize();
  const holdings = type ? await holdingRepository.findByType(type) : await holdingRepository.findAll();

  return successResponse({ holdings: holdings.map(serializeHolding) });
};

export const handler = middy(listHoldingsHandler).use(errorHandler());
