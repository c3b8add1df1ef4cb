/**
 * Digest dispatch boundary and the SES implementation
 */

import { SESClient, SendEmailCommand } from '@aws-sdk/client-ses';
import { getFrontendUrl } from '../../config/domain.js';
import { buildAvailabilityDigestEmail } from '../../lib/email/templates/availabilityDigest.js';
import type { DigestEmailWindow } from '../../lib/email/templates/availabilityDigest.js';
import { toError } from '../../lib/errors.js';
import { logger as defaultLogger, Logger } from '../../lib/logger.js';
import type { ConsolidatedWindow } from '../../types/entities.js';

export interface DigestRecipient {
  subscriptionId: string;
  ownerId: string;
  email: string;
  minSlotDurationMinutes: number;
}

/**
 * One admitted window with its club/court context
 */
export interface DigestWindow extends DigestEmailWindow {
  sourceWindow: ConsolidatedWindow;
}

export type DispatchResult =
  | { delivered: true; messageId?: string }
  | { delivered: false; error: string };

export interface DigestDispatcher {
  sendDigest(recipient: DigestRecipient, windows: DigestWindow[]): Promise<DispatchResult>;
}

export interface SesDigestDispatcherOptions {
  fromEmail: string;
  applicationName: string;
  frontendUrl: string;
  timeZone: string;
  ses?: SESClient;
  logger?: Logger;
}

export class SesDigestDispatcher implements DigestDispatcher {
  private readonly ses: SESClient;
  private readonly log: Logger;

  constructor(private readonly options: SesDigestDispatcherOptions) {
    this.ses = options.ses ?? new SESClient({ region: process.env['AWS_REGION'] || 'us-east-1' });
    this.log = (options.logger ?? defaultLogger).child({ component: 'SesDigestDispatcher' });
  }

  async sendDigest(recipient: DigestRecipient, windows: DigestWindow[]): Promise<DispatchResult> {
    const { subject, text, html } = buildAvailabilityDigestEmail({
      windows,
      minSlotDurationMinutes: recipient.minSlotDurationMinutes,
      timeZone: this.options.timeZone,
      applicationName: this.options.applicationName,
      manageUrl: getFrontendUrl(`/alerts/${recipient.subscriptionId}`, this.options.frontendUrl),
    });

    try {
      const result = await this.ses.send(
        new SendEmailCommand({
          Source: `${this.options.applicationName} <${this.options.fromEmail}>`,
          Destination: { ToAddresses: [recipient.email] },
          Message: {
            Subject: { Data: subject },
            Body: {
              Text: { Data: text },
              Html: { Data: html },
            },
          },
        })
      );

      this.log.info('Digest e-mail sent', {
        subscriptionId: recipient.subscriptionId,
        windows: windows.length,
        messageId: result.MessageId,
      });
      return { delivered: true, messageId: result.MessageId };
    } catch (error) {
      const err = toError(error);
      this.log.error('SES send failed', err, { subscriptionId: recipient.subscriptionId });
      return { delivered: false, error: err.message };
    }
  }
}
