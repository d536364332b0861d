import type { AccountId } from './account.js';

/** Anything with an author. Ownership is the basis for edit permission. */
export interface OwnedResource {
  readonly authorId: AccountId;
}

export interface News extends OwnedResource {
  readonly id: number;
  readonly title: string;
  readonly body: string;
  readonly isApproved: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface Article extends OwnedResource {
  readonly id: number;
  readonly title: string;
  readonly body: string;
  /** null while the article is a draft. */
  readonly publishedAt: Date | null;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/** Short "did you know" entry shown on the front page. */
export interface Tip extends OwnedResource {
  readonly id: number;
  readonly body: string;
  readonly publishedAt: Date;
  readonly createdAt: Date;
}

export interface Comment extends OwnedResource {
  readonly id: number;
  readonly articleId: number;
  readonly body: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
