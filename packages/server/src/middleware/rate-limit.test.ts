import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { AttemptLimiter, createRateLimitMiddleware, parseRateLimitConfig } from './rate-limit.js';

function appWithLimit(limiter: AttemptLimiter) {
  const app = express();
  app.use(express.json());
  app.use(createRateLimitMiddleware(limiter));
  app.post('/login', (_req, res) => {
    res.json({ ok: true });
  });
  return app;
}

describe('parseRateLimitConfig', () => {
  it('should fall back to defaults for missing or invalid values', () => {
    expect(parseRateLimitConfig({})).toEqual({ maxRequests: 20, windowMs: 60_000 });
    expect(parseRateLimitConfig({ COMMONROOM_RATE_LIMIT: 'lots', COMMONROOM_RATE_WINDOW_MS: '-5' })).toEqual({
      maxRequests: 20,
      windowMs: 60_000,
    });
  });

  it('should read the environment', () => {
    expect(parseRateLimitConfig({ COMMONROOM_RATE_LIMIT: '5', COMMONROOM_RATE_WINDOW_MS: '1000' })).toEqual({
      maxRequests: 5,
      windowMs: 1000,
    });
  });
});

describe('AttemptLimiter', () => {
  it('should count attempts per key and reopen the window once it has passed', () => {
    let now = 0;
    const limiter = new AttemptLimiter({ maxRequests: 2, windowMs: 10_000 }, () => now);

    expect(limiter.attempt('a')).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.attempt('a')).toEqual({ allowed: true, remaining: 0 });
    now = 2_500;
    expect(limiter.attempt('a')).toEqual({ allowed: false, retryAfterSeconds: 8 });
    expect(limiter.attempt('b')).toEqual({ allowed: true, remaining: 1 });
    now = 10_000;
    expect(limiter.attempt('a')).toEqual({ allowed: true, remaining: 1 });
  });

  it('should drop expired windows so the map shrinks', () => {
    let now = 0;
    const limiter = new AttemptLimiter({ maxRequests: 5, windowMs: 1_000 }, () => now);
    for (let i = 0; i < 50; i++) limiter.attempt(`10.0.0.${i}|user${i}@x.com`);
    expect(limiter.size).toBe(50);

    now = 1_000;
    limiter.attempt('10.0.0.99|late@x.com');

    expect(limiter.size).toBe(1);
  });

  it('should keep windows that are still open when sweeping', () => {
    let now = 0;
    const limiter = new AttemptLimiter({ maxRequests: 5, windowMs: 1_000 }, () => now);
    limiter.attempt('old');
    now = 600;
    limiter.attempt('recent');

    limiter.sweep(1_000);

    expect(limiter.size).toBe(1);
    expect(limiter.attempt('recent')).toEqual({ allowed: true, remaining: 3 });
  });
});

describe('createRateLimitMiddleware', () => {
  it('should allow up to the limit, then answer 429 with Retry-After', async () => {
    const limiter = new AttemptLimiter({ maxRequests: 2, windowMs: 60_000 }, () => 1_000_000);
    const app = appWithLimit(limiter);
    const body = { email: 'a@x.com', password: 'wrong' };

    const first = await request(app).post('/login').send(body);
    const second = await request(app).post('/login').send(body);
    const third = await request(app).post('/login').send(body);

    expect(first.status).toBe(200);
    expect(first.headers['x-ratelimit-remaining']).toBe('1');
    expect(second.status).toBe(200);
    expect(second.headers['x-ratelimit-remaining']).toBe('0');
    expect(third.status).toBe(429);
    expect(third.headers['retry-after']).toBe('60');
    expect(third.headers['x-ratelimit-limit']).toBe('2');
    expect(third.body).toEqual({
      error: 'Too Many Requests',
      message: 'Too many attempts. Try again in 60 second(s).',
      retry_after: 60,
    });
  });

  it('should count each submitted e-mail separately, ignoring case', async () => {
    const limiter = new AttemptLimiter({ maxRequests: 1, windowMs: 60_000 }, () => 0);
    const app = appWithLimit(limiter);

    await request(app).post('/login').send({ email: 'a@x.com' }).expect(200);
    await request(app).post('/login').send({ email: ' A@X.com ' }).expect(429);
    await request(app).post('/login').send({ email: 'b@x.com' }).expect(200);
    expect(limiter.size).toBe(2);
  });

  it('should fall back to the client address when no e-mail is sent', async () => {
    const limiter = new AttemptLimiter({ maxRequests: 1, windowMs: 60_000 }, () => 0);
    const app = appWithLimit(limiter);

    await request(app).post('/login').expect(200);
    await request(app).post('/login').send({ email: 42 }).expect(429);
  });

  it('should allow attempts again after the window', async () => {
    let now = 0;
    const app = appWithLimit(new AttemptLimiter({ maxRequests: 1, windowMs: 10_000 }, () => now));

    await request(app).post('/login').expect(200);
    await request(app).post('/login').expect(429);
    now += 10_000;
    await request(app).post('/login').expect(200);
  });
});
