import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { validateInput } from '../../middleware/zod-error-handler';
import { HoldingRepository } from '../../repositories/holding-repository';
import { holdingIdParamsSchema } from '../../types/schemas/handlers';
import { successResponse } from '../../utils/http-response';

const deleteHoldingHandler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  const { id } = validateInput(holdingIdParamsSchema, event.pathParameters ?? {});

  const holdingRepository = await HoldingRepository.initialize();
  await holdingRepository.delete(id);

  console.log('[HOLDINGS] Deleted holding', { id });
  return successResponse({ message: 'Holding deleted successfully' });
};

export const handler = middy(deleteHoldingHandler).use(errorHandler());
