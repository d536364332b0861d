import type { QueryResultRow } from 'pg';
import type { Account } from '../../types/account.js';
import type { Article, Comment, News, Tip } from '../../types/content.js';
import type { SessionRecord } from '../types.js';

export interface UserRow extends QueryResultRow {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  is_confirmed: boolean;
  last_login_at: Date | null;
  last_activity_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export function toAccount(row: UserRow): Account {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    isConfirmed: row.is_confirmed,
    lastLoginAt: row.last_login_at,
    lastActivityAt: row.last_activity_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface SessionRow extends QueryResultRow {
  token_hash: string;
  user_id: number;
  persistent: boolean;
  expires_at: Date;
  created_at: Date;
}

export function toSession(row: SessionRow): SessionRecord {
  return {
    tokenHash: row.token_hash,
    accountId: row.user_id,
    persistent: row.persistent,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}

export interface NewsRow extends QueryResultRow {
  id: number;
  author_id: number;
  title: string;
  body: string;
  is_approved: boolean;
  created_at: Date;
  updated_at: Date;
}

export function toNews(row: NewsRow): News {
  return {
    id: row.id,
    authorId: row.author_id,
    title: row.title,
    body: row.body,
    isApproved: row.is_approved,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface ArticleRow extends QueryResultRow {
  id: number;
  author_id: number;
  title: string;
  body: string;
  published_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

export function toArticle(row: ArticleRow): Article {
  return {
    id: row.id,
    authorId: row.author_id,
    title: row.title,
    body: row.body,
    publishedAt: row.published_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface TipRow extends QueryResultRow {
  id: number;
  author_id: number;
  body: string;
  published_at: Date;
  created_at: Date;
}

export function toTip(row: TipRow): Tip {
  return {
    id: row.id,
    authorId: row.author_id,
    body: row.body,
    publishedAt: row.published_at,
    createdAt: row.created_at,
  };
}

export interface CommentRow extends QueryResultRow {
  id: number;
  article_id: number;
  author_id: number;
  body: string;
  created_at: Date;
  updated_at: Date;
}

export function toComment(row: CommentRow): Comment {
  return {
    id: row.id,
    articleId: row.article_id,
    authorId: row.author_id,
    body: row.body,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
