import type { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { z } from 'zod';
import { ERRORS } from '@rollcall/shared';
import { error } from './response.js';

export type Parsed<T> = { body: T } | { parseError: APIGatewayProxyResult };

function describeIssues(err: z.ZodError): string[] {
  return err.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message,
  );
}

// Parses the JSON body and checks it against `schema`; the 400 carries zod's issue list.
export function parseBody<T>(event: APIGatewayProxyEvent, schema: z.ZodType<T>): Parsed<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(event.body || '{}');
  } catch {
    return { parseError: error('Invalid JSON', 400) };
  }
  const result = schema.safeParse(raw);
  if (!result.success) {
    return { parseError: error(ERRORS.INVALID_REQUEST, 400, describeIssues(result.error), 'INVALID_REQUEST') };
  }
  return { body: result.data };
}

export function queryParam(event: APIGatewayProxyEvent, name: string): string | undefined {
  const value = event.queryStringParameters?.[name];
  return value ? value : undefined;
}
