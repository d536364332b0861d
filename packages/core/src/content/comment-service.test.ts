import { describe, it, expect, beforeEach } from 'vitest';
import { ArticleService } from './article-service.js';
import { CommentService } from './comment-service.js';
import { AccessEvaluator } from '../auth/rbac.js';
import { MemoryStore } from '../storage/memory-store.js';
import { ManualClock } from '../utils/clock.js';
import { ForbiddenError, NotFoundError, UnauthenticatedError } from '../types/errors.js';
import type { Actor, RoleName } from '../types/account.js';

function actor(id: number, roles: RoleName[] = []): Actor {
  return { id, username: `user-${id}`, roles: new Set(roles) };
}

describe('CommentService', () => {
  let store: MemoryStore;
  let comments: CommentService;

  beforeEach(async () => {
    store = new MemoryStore(new ManualClock());
    const access = new AccessEvaluator();
    comments = new CommentService(store.comments, new ArticleService(store.articles, access), access);
    await store.articles.create({ authorId: 1, title: 'Hello', body: 'b', publishedAt: new Date() });
  });

  it('should add a comment to an existing article', async () => {
    const created = (await comments.createComment(actor(2), 1, { body: ' Nice ' }))._unsafeUnwrap();

    expect(created).toMatchObject({ articleId: 1, authorId: 2, body: 'Nice' });
    expect((await comments.listComments(null, 1))._unsafeUnwrap()).toHaveLength(1);
  });

  it('should refuse anonymous comments', async () => {
    expect((await comments.createComment(null, 1, { body: 'x' }))._unsafeUnwrapErr()).toBeInstanceOf(
      UnauthenticatedError,
    );
  });

  it('should report a missing article', async () => {
    const error = (await comments.createComment(actor(2), 7, { body: 'x' }))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('Article not found');
  });

  it('should let the author, a moderator or an administrator edit', async () => {
    await comments.createComment(actor(2), 1, { body: 'Nice' });

    expect((await comments.editComment(actor(3), 1, { body: 'x' }))._unsafeUnwrapErr()).toBeInstanceOf(ForbiddenError);
    expect((await comments.editComment(actor(2), 1, { body: 'Mine' }))._unsafeUnwrap().body).toBe('Mine');
    expect((await comments.editComment(actor(3, ['moderator']), 1, { body: 'Mod' }))._unsafeUnwrap().body).toBe('Mod');
    expect((await comments.editComment(actor(4, ['administrator']), 1, { body: 'Adm' }))._unsafeUnwrap().body).toBe(
      'Adm',
    );
  });

  it('should not let a librarian edit comments', async () => {
    await comments.createComment(actor(2), 1, { body: 'Nice' });

    expect((await comments.editComment(actor(5, ['librarian']), 1, { body: 'x' }))._unsafeUnwrapErr()).toBeInstanceOf(
      ForbiddenError,
    );
  });

  it('should list comments in the order they were written', async () => {
    await comments.createComment(actor(2), 1, { body: 'first' });
    await comments.createComment(actor(3), 1, { body: 'second' });

    const listed = (await comments.listComments(actor(4), 1))._unsafeUnwrap();

    expect(listed.map((c) => c.body)).toEqual(['first', 'second']);
  });

  it('should report a missing article when listing', async () => {
    expect((await comments.listComments(null, 99))._unsafeUnwrapErr()).toBeInstanceOf(NotFoundError);
  });

  describe('on a draft', () => {
    let draftId: number;

    beforeEach(async () => {
      const draft = await store.articles.create({ authorId: 1, title: 'Draft', body: 'b', publishedAt: null });
      draftId = draft._unsafeUnwrap().id;
    });

    it('should hide the draft from anyone but its author', async () => {
      const listed = (await comments.listComments(actor(2), draftId))._unsafeUnwrapErr();
      const created = (await comments.createComment(actor(2), draftId, { body: 'x' }))._unsafeUnwrapErr();

      expect(listed).toBeInstanceOf(NotFoundError);
      expect(listed.message).toBe('Article not found');
      expect(created).toBeInstanceOf(NotFoundError);
      expect((await comments.listComments(null, draftId))._unsafeUnwrapErr()).toBeInstanceOf(NotFoundError);
      expect((await store.comments.listByArticle(draftId))._unsafeUnwrap()).toEqual([]);
    });

    it('should let the author comment on and read their own draft', async () => {
      await comments.createComment(actor(1), draftId, { body: 'note to self' });

      const listed = (await comments.listComments(actor(1), draftId))._unsafeUnwrap();

      expect(listed.map((c) => c.body)).toEqual(['note to self']);
    });
  });
});
