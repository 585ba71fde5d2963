import { logger } from '../logger.js';
import type { NotificationOutcome, Notifier } from './Notifier.js';

/**
 * Records outcomes in the log when no mail transport is configured
 */
export class LogNotifier implements Notifier {
  async notify(jobId: string, outcome: NotificationOutcome): Promise<void> {
    logger.info('Job notification', {
      jobId,
      kind: outcome.kind,
      company: outcome.companyIdentifier,
      recipient: outcome.recipient,
      ...(outcome.kind === 'success'
        ? { suggestionSetId: outcome.suggestionSetId, suggestionCount: outcome.suggestionCount }
        : { classification: outcome.classification, message: outcome.message }),
    });
  }
}
