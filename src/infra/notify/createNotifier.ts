import type { Env } from '../env.js';
import { logger } from '../logger.js';
import { LogNotifier } from './LogNotifier.js';
import type { Notifier } from './Notifier.js';
import { ResendNotifier } from './ResendNotifier.js';

export function createNotifier(env: Env): Notifier {
  if (env.RESEND_API_KEY) {
    logger.info('Using Resend email notifications', { from: env.NOTIFY_FROM });
    return new ResendNotifier({
      apiKey: env.RESEND_API_KEY,
      from: env.NOTIFY_FROM,
      defaultRecipient: env.NOTIFY_DEFAULT_RECIPIENT,
    });
  }

  logger.warn('RESEND_API_KEY is not set, notifications will only be logged');
  return new LogNotifier();
}
