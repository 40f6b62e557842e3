import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { validateInput } from '../../middleware/zod-error-handler';
import { HoldingRepository } from '../../repositories/holding-repository';
import { holdingIdParamsSchema } from '../../types/schemas/handlers';
import { HoldingNotFoundError } from '../../utils/errors/repository-error';
import { serializeHolding, successResponse } from '../../utils/http-response';

const getHoldingHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { id } = validateInput(holdingIdParamsSchema, event.pathParameters ?? {});

  const holdingRepository = await HoldingRepository.initialize();
  const holding = await holdingRepository.findById(id);
  if (!holding) {
    throw new HoldingNotFoundError(id);
  }

  return successResponse(serializeHolding(holding));
};

export const handler = middy(getHoldingHandler).use(errorHandler());
