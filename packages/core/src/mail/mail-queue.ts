import type { SiteConfig } from '../types/config.js';
import { errorMessage } from '../types/errors.js';
import { renderTemplate } from './templates.js';
import type { MailDispatcher, Mailer, MailTemplateData, MailTemplateName } from './types.js';

/**
 * Renders and dispatches mail in the background. Failures are logged and
 * dropped; nothing is retried and nothing reaches the caller.
 */
export class MailQueue implements MailDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly mailer: Mailer,
    private readonly site: SiteConfig,
    private readonly from: string,
  ) {}

  enqueue<K extends MailTemplateName>(template: K, recipient: string, data: MailTemplateData[K]): void {
    const delivery = this.deliver(template, recipient, data).finally(() => {
      this.inFlight.delete(delivery);
    });
    this.inFlight.add(delivery);
  }

  /** Waits for every delivery started so far. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  private async deliver<K extends MailTemplateName>(
    template: K,
    recipient: string,
    data: MailTemplateData[K],
  ): Promise<void> {
    try {
      const rendered = renderTemplate(template, data, this.site);
      const result = await this.mailer.send({ from: this.from, to: recipient, ...rendered });
      if (result.isErr()) {
        // eslint-disable-next-line no-console
        console.error(`[mail] ${template} to ${recipient} failed: ${result.error.message}`);
      }
    } catch (error: unknown) {
      // eslint-disable-next-line no-console
      console.error(`[mail] ${template} to ${recipient} failed: ${errorMessage(error)}`);
    }
  }
}
