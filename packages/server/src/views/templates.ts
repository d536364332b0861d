/**
 * Server-rendered HTML pages.
 *
 * All HTML/CSS is inline, no client-side scripts. Templates receive
 * precomputed viewer flags and never evaluate access themselves.
 */

import { escapeHtml as esc, type Account, type Article, type BlogView } from '@commonroom/core';

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

export interface LayoutOptions {
  readonly siteName: string;
  readonly title: string;
  /** Username shown in the header when someone is signed in. */
  readonly viewer?: string | null;
}

export function renderLayout(options: LayoutOptions, content: string): string {
  const account = options.viewer
    ? `<span class="viewer">Signed in as ${esc(options.viewer)}</span>`
    : '<span class="viewer">Not signed in</span>';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${esc(options.title)} | ${esc(options.siteName)}</title>
  <style>${CSS}</style>
</head>
<body>
  <header class="site-header">
    <span class="logo">${esc(options.siteName)}</span>
    ${account}
  </header>
  <main class="content">
    ${content}
  </main>
</body>
</html>`;
}

// ---------------------------------------------------------------------------
// Blog
// ---------------------------------------------------------------------------

export function renderBlogContent(view: BlogView): string {
  const { owner, posts, flags } = view;

  const controls = flags.isOwner && flags.canCreateArticle
    ? '<div class="owner-controls"><p>Write and edit posts through <code>/api/v1/articles</code>.</p></div>'
    : '';

  const list = posts.length > 0
    ? `<ul class="posts">\n${posts.map(renderPost).join('\n')}\n</ul>`
    : '<p class="empty-state">No posts yet.</p>';

  return `
    <h1>${esc(owner.username)}'s blog</h1>
    ${controls}
    ${list}`;
}

function renderPost(post: Article): string {
  const date = post.publishedAt ? formatDate(post.publishedAt) : 'Draft';
  return `<li class="post"><h2>${esc(post.title)}</h2><time>${esc(date)}</time><p>${esc(excerpt(post.body))}</p></li>`;
}

// ---------------------------------------------------------------------------
// Registration pages
// ---------------------------------------------------------------------------

export function renderConfirmedContent(account: Account): string {
  return `
    <h1>Welcome, ${esc(account.username)}!</h1>
    <p class="flash flash-success">Your account is confirmed and you are now signed in.</p>
    <p><a href="/blog/${encodeURIComponent(account.username)}">Go to your blog</a></p>`;
}

export function renderInvalidConfirmationContent(): string {
  return `
    <h1>Confirmation failed</h1>
    <p class="flash flash-error">This confirmation link is invalid or has already been used.</p>`;
}

export function renderPreconfirmationContent(): string {
  return `
    <h1>Check your inbox</h1>
    <p>We sent you an e-mail with a confirmation link. Open it to activate your account.</p>`;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const EXCERPT_LENGTH = 280;

export function excerpt(body: string, length = EXCERPT_LENGTH): string {
  const text = body.trim();
  return text.length <= length ? text : `${text.slice(0, length).trimEnd()}…`;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

// ---------------------------------------------------------------------------
// Inline CSS
// ---------------------------------------------------------------------------

const CSS = `
  :root {
    --bg: #fafaf9;
    --surface: #ffffff;
    --border: #e7e5e4;
    --text: #1c1917;
    --text-muted: #78716c;
    --primary: #0f766e;
    --green: #15803d;
    --red: #b91c1c;
    --font: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
  }

  *, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }

  body { font-family: var(--font); background: var(--bg); color: var(--text); line-height: 1.6; }

  .site-header {
    display: flex;
    justify-content: space-between;
    align-items: center;
    padding: 0.75rem 1.5rem;
    background: var(--surface);
    border-bottom: 1px solid var(--border);
  }

  .logo { font-weight: 700; color: var(--primary); }
  .viewer { color: var(--text-muted); font-size: 0.875rem; }

  .content { max-width: 48rem; margin: 2rem auto; padding: 0 1.5rem; }
  h1 { margin-bottom: 1rem; }

  .posts { list-style: none; }
  .post { padding: 1rem 0; border-bottom: 1px solid var(--border); }
  .post h2 { font-size: 1.25rem; }
  .post time { color: var(--text-muted); font-size: 0.875rem; margin-right: 0.5rem; }

  .owner-controls { margin-bottom: 1rem; }

  .empty-state { color: var(--text-muted); font-style: italic; }

  .flash { padding: 0.75rem 1rem; border-radius: 4px; margin-bottom: 1rem; }
  .flash-success { border: 1px solid var(--green); color: var(--green); }
  .flash-error { border: 1px solid var(--red); color: var(--red); }
`;
