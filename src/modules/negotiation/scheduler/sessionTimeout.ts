import cron from 'node-cron';
import logger from '../../../config/logger.js';
import type { NegotiationService } from '../negotiation.service.js';

let schedulerTask: cron.ScheduledTask | null = null;

/**
 * Close open sessions whose latest round is older than the timeout as TIMEOUT.
 * Returns the number of sessions closed.
 */
async function sweepStaleSessions(service: NegotiationService, timeoutMinutes: number): Promise<number> {
  logger.info('Running session timeout sweep...');

  try {
    const closed = await service.expireStaleSessions(timeoutMinutes);
    logger.info(`Session timeout sweep completed. Timed out ${closed} sessions.`);
    return closed;
  } catch (error) {
    logger.error(
      `Session timeout sweep error: ${error instanceof Error ? error.message : String(error)}`
    );
    return 0;
  }
}

/**
 * Start the session timeout scheduler
 * Runs every five minutes by default
 */
export function startSessionTimeoutScheduler(
  service: NegotiationService,
  timeoutMinutes: number,
  cronExpression: string = '*/5 * * * *'
): void {
  if (schedulerTask) {
    logger.warn('Session timeout scheduler already running');
    return;
  }

  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid cron expression for session timeout sweep: ${cronExpression}`);
  }

  schedulerTask = cron.schedule(cronExpression, async () => {
    await sweepStaleSessions(service, timeoutMinutes);
  });

  logger.info(`Session timeout scheduler started with cron expression: ${cronExpression}`);
}

export function stopSessionTimeoutScheduler(): void {
  if (schedulerTask) {
    schedulerTask.stop();
    schedulerTask = null;
    logger.info('Session timeout scheduler stopped');
  }
}

export function isSessionTimeoutSchedulerRunning(): boolean {
  return schedulerTask !== null;
}

/**
 * Manually trigger a sweep (for testing or admin use)
 */
export async function triggerSessionTimeoutSweep(
  service: NegotiationService,
  timeoutMinutes: number
): Promise<number> {
  return sweepStaleSessions(service, timeoutMinutes);
}
