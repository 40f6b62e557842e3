import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { parseJsonBody, validateInput } from '../../middleware/zod-error-handler';
import { HoldingRepository } from '../../repositories/holding-repository';
import { holdingIdParamsSchema, updateHoldingBodySchema } from '../../types/schemas/handlers';
import { serializeHolding, successResponse } from '../../utils/http-response';

const updateHoldingHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { id } = validateInput(holdingIdParamsSchema, event.pathParameters ?? {});
  const body = validateInput(updateHoldingBodySchema, parseJsonBody(event.body));

  const holdingRepository = await HoldingRepository.initialize();
  const holding = await holdingRepository.update(id, {
    quantity: body.quantity,
    costBasis: body.cost_basis,
  });

  console.log('[HOLDINGS] Updated holding', { id });
  return successResponse(serializeHolding(holding));
};

export const handler = middy(updateHoldingHandler).use(errorHandler());
