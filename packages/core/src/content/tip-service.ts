import { err } from 'neverthrow';
import type { Actor } from '../types/account.js';
import type { Tip } from '../types/content.js';
import type { AccessEvaluator } from '../auth/rbac.js';
import type { TipRepository } from '../storage/types.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { authorize, found, parseInput, type ContentResult } from './errors.js';
import { tipInputSchema } from './schemas.js';

export const LATEST_TIPS_LIMIT = 10;

export class TipService {
  constructor(
    private readonly tips: TipRepository,
    private readonly access: AccessEvaluator,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Most recently published first. */
  async latestTips(limit: number = LATEST_TIPS_LIMIT): ContentResult<Tip[]> {
    return this.tips.latest(limit);
  }

  async createTip(actor: Actor | null, input: unknown): ContentResult<Tip> {
    const author = authorize(this.access, actor, 'create_tip');
    if (author.isErr()) return err(author.error);

    const parsed = parseInput(tipInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return this.tips.create({ authorId: author.value.id, body: parsed.value.body, publishedAt: this.clock.now() });
  }

  async editTip(actor: Actor | null, id: number, input: unknown): ContentResult<Tip> {
    const tip = await this.tips.findById(id);
    if (tip.isErr()) return err(tip.error);

    const allowed = authorize(this.access, actor, 'edit_tip', tip.value);
    if (allowed.isErr()) return err(allowed.error);

    const parsed = parseInput(tipInputSchema, input);
    if (parsed.isErr()) return err(parsed.error);

    return found(await this.tips.update(id, parsed.value.body), 'Tip');
  }
}
