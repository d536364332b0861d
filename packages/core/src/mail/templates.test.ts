import { describe, it, expect } from 'vitest';
import { confirmationUrl, renderTemplate } from './templates.js';

const SITE = { name: 'Commonroom', baseUrl: 'https://commonroom.test' };

describe('renderTemplate', () => {
  it('should build the confirmation link from the site base url', () => {
    expect(confirmationUrl(SITE, 'Ab12')).toBe('https://commonroom.test/auth/confirm/Ab12');
  });

  it('should render the registration mail', () => {
    const mail = renderTemplate('registration', { username: 'alice', code: 'Ab12' }, SITE);

    expect(mail.subject).toBe('Confirm your registration');
    expect(mail.text.split('\n')[0]).toBe('Hello alice,');
    expect(mail.text.split('\n')[3]).toBe('https://commonroom.test/auth/confirm/Ab12');
    expect(mail.html).toContain(
      '<a href="https://commonroom.test/auth/confirm/Ab12">https://commonroom.test/auth/confirm/Ab12</a>',
    );
  });

  it('should escape the username in html', () => {
    const mail = renderTemplate('registration', { username: '<b>x</b>', code: 'c' }, SITE);
    expect(mail.html.split('\n')[0]).toBe('<p>Hello &lt;b&gt;x&lt;/b&gt;,</p>');
  });
});
