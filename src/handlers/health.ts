import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import middy from '@middy/core';
import { errorHandler } from '../middleware/error-handler';
import { HTTP_STATUS } from '../constants/http';
import { checkProviderHealth } from '../services/portfolio-service';
import { getProviders, registerShutdownHooks } from '../services/providers/provider-registry';
import { serializeHealth, successResponse } from '../utils/http-response';

/**
 * Reports provider liveness; 206 when any provider is unhealthy.
 * Reads the provider registry directly so it answers without a database.
 */
const healthHandler = async (_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
  registerShutdownHooks();
  const report = await checkProviderHealth(getProviders());

  return successResponse(
    serializeHealth(report),
    report.status === 'ok' ? HTTP_STATUS.OK : HTTP_STATUS.PARTIAL_CONTENT,
  );
};

export const handler = middy(healthHandler).use(errorHandler());
