import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { success, error } from '../utils/response.js';
import { describeError } from '../store/index.js';
import { getServices } from '../app.js';
import { config } from '../config.js';

export async function handler(_event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  try {
    const { selection } = await getServices();
    return success({
      status: 'ok',
      environment: config.environment,
      storage: selection.backend,
      storageFallback: selection.fellBack,
      timestamp: new Date().toISOString(),
    });
  } catch (err) {
    console.error('Health check failed:', err);
    return error(`Storage unavailable: ${describeError(err)}`, 503);
  }
}
