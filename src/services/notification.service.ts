import { Resend } from 'resend';
import { logger } from '../config/logger';

export interface MailAttachment {
  filename: string;
  content: Buffer;
}

export interface OutgoingMail {
  to: string;
  subject: string;
  html: string;
  text?: string;
  attachments?: MailAttachment[];
}

export interface NotificationSender {
  send(mail: OutgoingMail): Promise<void>;
}

/**
 * Sends mail through Resend
 */
export class ResendNotificationSender implements NotificationSender {
  private client: Resend;

  constructor(
    apiKey: string,
    private from: string
  ) {
    this.client = new Resend(apiKey);
  }

  async send(mail: OutgoingMail): Promise<void> {
    const { data, error } = await this.client.emails.send({
      from: this.from,
      to: [mail.to],
      subject: mail.subject,
      html: mail.html,
      text: mail.text ?? '',
      ...(mail.attachments && {
        attachments: mail.attachments.map((attachment) => ({
          filename: attachment.filename,
          content: attachment.content,
        })),
      }),
    });

    if (error) throw new Error(error.message);
    logger.debug('Mail accepted by provider', { messageId: data?.id });
  }
}

export interface DispatcherOptions {
  maxAttempts: number;
  retryDelayMs: number;
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Notification Dispatcher
 *
 * Mail is a side effect of committed work: it is queued after the storage
 * write and never fails the request that queued it. Pending deliveries are
 * tracked so shutdown (and tests) can wait for them with drain().
 */
export class NotificationDispatcher {
  private inFlight = new Set<Promise<void>>();

  constructor(
    private sender: NotificationSender | null,
    private options: DispatcherOptions
  ) {}

  get enabled(): boolean {
    return this.sender !== null;
  }

  /**
   * Queue a delivery. The message is built lazily so slip rendering happens
   * off the request path too.
   */
  enqueue(description: string, build: () => Promise<OutgoingMail>): void {
    if (!this.sender) {
      logger.debug('Mail delivery disabled, dropping notification', { description });
      return;
    }

    const delivery = this.deliver(this.sender, description, build).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /**
   * Deliver right away and report whether it went out (used for login codes,
   * where the caller has to know)
   */
  async deliverNow(description: string, mail: OutgoingMail): Promise<boolean> {
    if (!this.sender) {
      logger.warn('Mail delivery disabled, cannot send notification', { description });
      return false;
    }

    return this.attempt(this.sender, description, mail);
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private async deliver(
    sender: NotificationSender,
    description: string,
    build: () => Promise<OutgoingMail>
  ): Promise<void> {
    let mail: OutgoingMail;

    try {
      mail = await build();
    } catch (error) {
      logger.error('Failed to build notification', {
        description,
        error: error instanceof Error ? error.message : String(error),
      });
      return;
    }

    await this.attempt(sender, description, mail);
  }

  private async attempt(
    sender: NotificationSender,
    description: string,
    mail: OutgoingMail
  ): Promise<boolean> {
    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      try {
        await sender.send(mail);
        logger.info('Notification sent', { description, to: mail.to, attempt });
        return true;
      } catch (error) {
        logger.warn('Notification attempt failed', {
          description,
          attempt,
          error: error instanceof Error ? error.message : String(error),
        });

        if (attempt < this.options.maxAttempts) {
          await sleep(this.options.retryDelayMs * attempt);
        }
      }
    }

    logger.error('Notification gave up', { description, to: mail.to });
    return false;
  }
}
