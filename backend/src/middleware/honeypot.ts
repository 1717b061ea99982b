import type { APIGatewayProxyEvent } from 'aws-lambda';
import { HONEYPOT_FIELDS } from '@rollcall/shared';
import { error } from '../utils/response.js';
import { config } from '../config.js';

// Public forms render hidden decoy fields that people never see or fill in.
// Bots that populate every field fill these too; such requests get a 403.
//
// Passes when the body is not a JSON object (the handler reports that) or
// when honeypotEnabled is off for this environment.
export function validateHoneypot(event: APIGatewayProxyEvent) {
  if (!config.features.honeypotEnabled) {
    return { valid: true, errorResponse: null };
  }

  let body: unknown;
  try {
    body = JSON.parse(event.body || '{}');
  } catch {
    return { valid: true, errorResponse: null };
  }
  if (typeof body !== 'object' || body === null) {
    return { valid: true, errorResponse: null };
  }

  const fields = new Map(Object.entries(body));
  if (HONEYPOT_FIELDS.some((field) => Boolean(fields.get(field)))) {
    return { valid: false, errorResponse: error('Forbidden', 403) };
  }

  return { valid: true, errorResponse: null };
}
