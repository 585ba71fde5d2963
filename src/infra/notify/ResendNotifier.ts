import { Resend } from 'resend';
import { NotifyError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { NotificationOutcome, Notifier } from './Notifier.js';

export interface ResendNotifierOptions {
  apiKey: string;
  from: string;
  /** Used when the job carries no recipient of its own */
  defaultRecipient?: string;
}

interface EmailContent {
  subject: string;
  html: string;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderNotification(jobId: string, outcome: NotificationOutcome): EmailContent {
  const company = escapeHtml(outcome.companyName ?? outcome.companyIdentifier);

  if (outcome.kind === 'success') {
    return {
      subject: `Your campaign suggestions for ${outcome.companyName ?? outcome.companyIdentifier} are ready`,
      html: [
        `<p>Your campaign suggestions for <strong>${company}</strong> are ready.</p>`,
        `<p>${outcome.suggestionCount} suggestion(s) were generated. Reference: <code>${escapeHtml(outcome.suggestionSetId)}</code></p>`,
        `<p>Job: <code>${escapeHtml(jobId)}</code></p>`,
      ].join('\n'),
    };
  }

  return {
    subject: `Campaign suggestions for ${outcome.companyName ?? outcome.companyIdentifier} could not be generated`,
    html: [
      `<p>We could not generate campaign suggestions for <strong>${company}</strong>.</p>`,
      `<p>Reason: ${escapeHtml(outcome.classification)} - ${escapeHtml(outcome.message)}</p>`,
      `<p>Job: <code>${escapeHtml(jobId)}</code></p>`,
    ].join('\n'),
  };
}

/**
 * Email notifier backed by Resend
 */
export class ResendNotifier implements Notifier {
  private resend: Resend;

  constructor(private options: ResendNotifierOptions) {
    this.resend = new Resend(options.apiKey);
  }

  async notify(jobId: string, outcome: NotificationOutcome): Promise<void> {
    const recipient = outcome.recipient ?? this.options.defaultRecipient;
    if (!recipient) {
      throw new NotifyError('No notification recipient for job', { jobId });
    }

    const content = renderNotification(jobId, outcome);

    let result: Awaited<ReturnType<Resend['emails']['send']>>;
    try {
      result = await this.resend.emails.send({
        from: this.options.from,
        to: [recipient],
        subject: content.subject,
        html: content.html,
      });
    } catch (error) {
      throw new NotifyError('Resend request failed', { jobId, error });
    }

    if (result.error) {
      throw new NotifyError(`Resend send failed: ${result.error.message}`, {
        jobId,
        error: result.error,
      });
    }

    logger.info('Notification email sent', { jobId, kind: outcome.kind, emailId: result.data?.id });
  }
}
