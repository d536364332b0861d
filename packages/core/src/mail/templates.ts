import type { SiteConfig } from '../types/config.js';
import { escapeHtml } from '../utils/html.js';
import type { MailTemplateData, MailTemplateName } from './types.js';

export interface RenderedMail {
  readonly subject: string;
  readonly text: string;
  readonly html: string;
}

type TemplateRenderers = {
  [K in MailTemplateName]: (data: MailTemplateData[K], site: SiteConfig) => RenderedMail;
};

export function confirmationUrl(site: SiteConfig, code: string): string {
  return `${site.baseUrl}/auth/confirm/${encodeURIComponent(code)}`;
}

const TEMPLATES: TemplateRenderers = {
  registration: ({ username, code }, site) => {
    const url = confirmationUrl(site, code);
    return {
      subject: 'Confirm your registration',
      text: [
        `Hello ${username},`,
        '',
        `Thanks for signing up to ${site.name}. Open the link below to activate your account:`,
        url,
        '',
        'If you did not register, ignore this message.',
      ].join('\n'),
      html: [
        `<p>Hello ${escapeHtml(username)},</p>`,
        `<p>Thanks for signing up to ${escapeHtml(site.name)}. Open the link below to activate your account:</p>`,
        `<p><a href="${escapeHtml(url)}">${escapeHtml(url)}</a></p>`,
        '<p>If you did not register, ignore this message.</p>',
      ].join('\n'),
    };
  },
};

export function renderTemplate<K extends MailTemplateName>(
  template: K,
  data: MailTemplateData[K],
  site: SiteConfig,
): RenderedMail {
  const render: TemplateRenderers[K] = TEMPLATES[template];
  return render(data, site);
}
