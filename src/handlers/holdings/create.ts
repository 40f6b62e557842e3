import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { parseJsonBody, validateInput } from '../../middleware/zod-error-handler';
import { HoldingRepository } from '../../repositories/holding-repository';
import { HTTP_STATUS } from '../../constants/http';
import { createHoldingBodySchema } from '../../types/schemas/handlers';
import { serializeHolding, successResponse } from '../../utils/http-response';

/**
 * Creates a holding; a second holding for the same type and symbol is a 409
 */
const createHoldingHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const body = validateInput(createHoldingBodySchema, parseJsonBody(event.body));

  const holdingRepository = await HoldingRepository.initialize();
  const holding = await holdingRepository.create({
    type: body.type,
    symbol: body.symbol,
    quantity: body.quantity,
    costBasis: body.cost_basis,
  });

  console.log('[HOLDINGS] Created holding', { id: holding.id, type: holding.type, symbol: holding.symbol });
  return successResponse(serializeHolding(holding), HTTP_STATUS.CREATED);
};

export const handler = middy(createHoldingHandler).use(errorHandler());
