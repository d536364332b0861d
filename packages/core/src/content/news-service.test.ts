import { describe, it, expect, beforeEach } from 'vitest';
import { NewsService } from './news-service.js';
import { AccessEvaluator } from '../auth/rbac.js';
import { MemoryStore } from '../storage/memory-store.js';
import { ForbiddenError, NotFoundError, UnauthenticatedError, ValidationError } from '../types/errors.js';
import type { Actor, RoleName } from '../types/account.js';

function actor(id: number, roles: RoleName[] = []): Actor {
  return { id, username: `user-${id}`, roles: new Set(roles) };
}

describe('NewsService', () => {
  let news: NewsService;

  beforeEach(() => {
    news = new NewsService(new MemoryStore().news, new AccessEvaluator());
  });

  it('should create news unapproved and hide it until approval', async () => {
    const created = (await news.createNews(actor(1), { title: 'Release', body: 'Version 2 is out' }))._unsafeUnwrap();

    expect(created.isApproved).toBe(false);
    expect(created.authorId).toBe(1);
    expect((await news.listApprovedNews())._unsafeUnwrap()).toEqual([]);

    const approved = (await news.approveNews(actor(2, ['moderator']), created.id))._unsafeUnwrap();
    expect(approved.isApproved).toBe(true);
    expect((await news.listApprovedNews())._unsafeUnwrap().map((n) => n.id)).toEqual([created.id]);
  });

  it('should validate title and body', async () => {
    const error = (await news.createNews(actor(1), { title: '' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.fields).toEqual({ title: ['Title is required'], body: ['Required'] });
    }
  });

  it('should refuse approval by a regular user', async () => {
    const created = (await news.createNews(actor(1), { title: 't', body: 'b' }))._unsafeUnwrap();
    expect((await news.approveNews(actor(1), created.id))._unsafeUnwrapErr()).toBeInstanceOf(ForbiddenError);
  });

  it('should report approving missing news as not found', async () => {
    expect((await news.approveNews(actor(1, ['administrator']), 9))._unsafeUnwrapErr()).toBeInstanceOf(NotFoundError);
  });

  it('should let only the author edit news', async () => {
    const created = (await news.createNews(actor(1), { title: 't', body: 'b' }))._unsafeUnwrap();

    expect((await news.editNews(actor(1), created.id, { title: 'Updated' }))._unsafeUnwrap().title).toBe('Updated');
    expect((await news.editNews(actor(2, ['administrator']), created.id, { title: 'x' }))._unsafeUnwrapErr()).toBeInstanceOf(
      ForbiddenError,
    );
    expect((await news.editNews(null, created.id, { title: 'x' }))._unsafeUnwrapErr()).toBeInstanceOf(
      UnauthenticatedError,
    );
  });
});
