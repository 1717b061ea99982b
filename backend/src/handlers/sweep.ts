import type { ScheduledEvent } from 'aws-lambda';
import type { SweepResult } from '@rollcall/shared';
import { getServices } from '../app.js';

// Runs on a schedule. Throwing marks the invocation failed so the scheduler retries.
export async function handler(_event: ScheduledEvent): Promise<SweepResult> {
  const { access } = await getServices();
  const result = await access.sweepExpired();
  if (!result.ok) {
    throw new Error(`Expiry sweep failed: ${result.error.message}`);
  }
  return result.data;
}
