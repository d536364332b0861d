import { describe, it, expect, beforeEach } from 'vitest';
import { AccountDirectory } from './account-directory.js';
import { BlogService } from './blog.js';
import { AccessEvaluator } from '../auth/rbac.js';
import { PresenceTracker } from '../presence/presence-tracker.js';
import { MemoryStore } from '../storage/memory-store.js';
import { ManualClock } from '../utils/clock.js';
import { NotFoundError } from '../types/errors.js';

describe('AccountDirectory', () => {
  let clock: ManualClock;
  let store: MemoryStore;
  let directory: AccountDirectory;

  beforeEach(async () => {
    clock = new ManualClock('2024-01-01T12:00:00.000Z');
    store = new MemoryStore(clock);
    directory = new AccountDirectory(store.accounts, store.roles, new PresenceTracker(store.accounts, clock));
    for (const username of ['alice', 'bob', 'carol']) {
      await store.accounts.createPending({ username, email: `${username}@example.com`, passwordHash: 'h' }, username);
    }
  });

  it('should return a profile with roles and presence', async () => {
    store.grantRole(1, 'librarian');
    await store.accounts.updatePresence(1, { lastActivityAt: clock.now() });

    const profile = (await directory.findProfile('ALICE'))._unsafeUnwrap();

    expect(profile.account.username).toBe('alice');
    expect(profile.roles).toEqual(['librarian']);
    expect(profile.online).toBe(true);
  });

  it('should report an unknown username as not found', async () => {
    const error = (await directory.findProfile('nobody'))._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.message).toBe('User not found');
  });

  it('should return nothing for a blank search', async () => {
    expect((await directory.searchAccounts('   '))._unsafeUnwrap()).toEqual([]);
  });

  it('should split online and offline using the server clock', async () => {
    await store.accounts.updatePresence(1, { lastActivityAt: new Date('2024-01-01T11:59:00.000Z') });
    await store.accounts.updatePresence(2, { lastActivityAt: new Date('2024-01-01T11:50:00.000Z') });

    const online = (await directory.listOnline())._unsafeUnwrap();
    const offline = (await directory.listOffline())._unsafeUnwrap();

    expect(online.map((a) => a.username)).toEqual(['alice']);
    expect(offline.map((a) => a.username)).toEqual(['bob', 'carol']);
  });
});

describe('BlogService', () => {
  let store: MemoryStore;
  let blog: BlogService;

  beforeEach(async () => {
    store = new MemoryStore(new ManualClock());
    blog = new BlogService(store.accounts, store.articles, new AccessEvaluator());
    await store.accounts.createPending({ username: 'alice', email: 'a@x.com', passwordHash: 'h' }, 'c1');
    await store.articles.create({ authorId: 1, title: 'First post', body: 'b', publishedAt: new Date('2024-01-01') });
  });

  it('should give the owner controls', async () => {
    const view = (await blog.buildBlog({ id: 1, username: 'alice', roles: new Set() }, 'alice'))._unsafeUnwrap();

    expect(view.owner.username).toBe('alice');
    expect(view.posts.map((p) => p.title)).toEqual(['First post']);
    expect(view.flags).toEqual({ isOwner: true, canCreateArticle: true });
  });

  it('should give anonymous visitors no controls', async () => {
    const view = (await blog.buildBlog(null, 'alice'))._unsafeUnwrap();
    expect(view.flags).toEqual({ isOwner: false, canCreateArticle: false });
  });

  it('should report a missing blog owner as not found', async () => {
    expect((await blog.buildBlog(null, 'ghost'))._unsafeUnwrapErr()).toBeInstanceOf(NotFoundError);
  });
});
