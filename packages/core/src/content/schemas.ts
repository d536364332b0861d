import { z } from 'zod';

export const newsInputSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200, 'Title must be at most 200 characters'),
  body: z.string().trim().min(1, 'Body is required'),
});

export const newsPatchSchema = newsInputSchema.partial();

export const articleInputSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200, 'Title must be at most 200 characters'),
  body: z.string().trim().min(1, 'Body is required'),
  /** Publish immediately; drafts otherwise. */
  publish: z.boolean().optional().default(true),
});

export const articlePatchSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200, 'Title must be at most 200 characters').optional(),
  body: z.string().trim().min(1, 'Body is required').optional(),
  publish: z.boolean().optional(),
});

export const tipInputSchema = z.object({
  body: z.string().trim().min(1, 'Body is required').max(2000, 'Tip must be at most 2000 characters'),
});

export const commentInputSchema = z.object({
  body: z.string().trim().min(1, 'Body is required').max(5000, 'Comment must be at most 5000 characters'),
});

export type NewsInput = z.infer<typeof newsInputSchema>;
export type ArticleInput = z.infer<typeof articleInputSchema>;
