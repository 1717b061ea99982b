import type { AccessIssuer } from './access.js';

export interface ExpirySweep {
  stop(): void;
}

/**
 * Periodically deletes expired sessions and links. DynamoDB's own TTL does
 * this for the table backend; the file backend relies on the sweep. The timer
 * is unref'd so it never holds the process open.
 */
export function startExpirySweep(issuer: Pick<AccessIssuer, 'sweepExpired'>, intervalMs: number): ExpirySweep {
  let running = false;

  const sweep = async (): Promise<void> => {
    if (running) return;
    running = true;
    try {
      const result = await issuer.sweepExpired();
      if (!result.ok) console.warn(`Expiry sweep failed: ${result.error.message}`);
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    sweep().catch((err: unknown) => console.error('Expiry sweep error:', err));
  }, intervalMs);
  timer.unref();

  return {
    stop() {
      clearInterval(timer);
    },
  };
}
