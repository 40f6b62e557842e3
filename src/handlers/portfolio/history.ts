import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../../middleware/error-handler';
import { successResponse } from '../../utils/http-response';

// Portfolio snapshots are not recorded yet, so there is no history to report
const portfolioHistoryHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> =>
  successResponse({ history: [] });

export const handler = middy(portfolioHistoryHandler).use(errorHandler());
