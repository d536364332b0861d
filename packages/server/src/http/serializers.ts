import type { Account, Article, Comment, News, Tip, Profile, OpenedSession, Actor } from '@commonroom/core';

// Wire shapes: camelCase, ISO-8601 dates, never a password hash.

export interface PublicAccount {
  readonly id: number;
  readonly username: string;
  readonly isConfirmed: boolean;
  readonly lastLoginAt: string | null;
  readonly lastActivityAt: string | null;
  readonly createdAt: string;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function serializeAccount(account: Account): PublicAccount {
  return {
    id: account.id,
    username: account.username,
    isConfirmed: account.isConfirmed,
    lastLoginAt: iso(account.lastLoginAt),
    lastActivityAt: iso(account.lastActivityAt),
    createdAt: account.createdAt.toISOString(),
  };
}

export function serializeProfile(profile: Profile) {
  return {
    ...serializeAccount(profile.account),
    roles: profile.roles,
    online: profile.online,
  };
}

export function serializeActor(actor: Actor) {
  return { id: actor.id, username: actor.username, roles: [...actor.roles].sort() };
}

export function serializeSession(session: OpenedSession) {
  return {
    token: session.token,
    expiresAt: session.expiresAt.toISOString(),
    persistent: session.persistent,
  };
}

export function serializeNews(news: News) {
  return {
    id: news.id,
    authorId: news.authorId,
    title: news.title,
    body: news.body,
    isApproved: news.isApproved,
    createdAt: news.createdAt.toISOString(),
    updatedAt: news.updatedAt.toISOString(),
  };
}

export function serializeArticle(article: Article) {
  return {
    id: article.id,
    authorId: article.authorId,
    title: article.title,
    body: article.body,
    publishedAt: iso(article.publishedAt),
    createdAt: article.createdAt.toISOString(),
    updatedAt: article.updatedAt.toISOString(),
  };
}

export function serializeTip(tip: Tip) {
  return {
    id: tip.id,
    authorId: tip.authorId,
    body: tip.body,
    publishedAt: tip.publishedAt.toISOString(),
    createdAt: tip.createdAt.toISOString(),
  };
}

export function serializeComment(comment: Comment) {
  return {
    id: comment.id,
    articleId: comment.articleId,
    authorId: comment.authorId,
    body: comment.body,
    createdAt: comment.createdAt.toISOString(),
    updatedAt: comment.updatedAt.toISOString(),
  };
}
