import type { BotUser, DbAd } from "@safehost/shared";
import { AuthorizationMismatchError, NotFoundError, StoreError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { Reply } from "../replies.js";
import type { AdRepository } from "../repository.js";
import { sessionKey, type Session, type SessionStorage } from "../state.js";
import { TEXT } from "../texts.js";
import { transition, type ConversationInput, type Effect, type Transition } from "./conversation.js";

export type RunnerDeps = {
  repository: AdRepository;
  sessions: SessionStorage;
  logger: Logger;
  now?: () => Date;
};

type Outcome = { session: Session | undefined; replies: Reply[] };

export async function requireOwnedAd(repository: AdRepository, adId: number, userId: number): Promise<DbAd> {
  const ad = await repository.findAd(adId);
  if (!ad) throw new NotFoundError(`ad ${adId} not found`);
  if (ad.user_id !== userId) throw new AuthorizationMismatchError(`ad ${adId} is not owned by ${userId}`);
  return ad;
}

/**
 * Loads the user's session, applies one transition, runs its store effect and
 * persists the resulting session.
 */
export class ConversationRunner {
  private readonly now: () => Date;

  constructor(private readonly deps: RunnerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handle(user: BotUser, input: ConversationInput): Promise<{ handled: boolean; replies: Reply[] }> {
    const key = sessionKey(user.user_id);
    const current = await this.deps.sessions.read(key);
    const next = transition(current, input, this.now());
    if (!next.handled) return { handled: false, replies: [] };

    const outcome = next.effect ? await this.runEffect(user, current, next, next.effect) : next;

    this.deps.logger.debug(
      { t: "transition", user: user.user_id, from: current?.step ?? null, to: outcome.session?.step ?? null },
      "conversation step"
    );
    if (outcome.session) {
      await this.deps.sessions.write(key, outcome.session);
    } else {
      await this.deps.sessions.delete(key);
    }
    return { handled: true, replies: outcome.replies };
  }

  private async runEffect(user: BotUser, current: Session | undefined, next: Transition, effect: Effect): Promise<Outcome> {
    const { repository, logger } = this.deps;
    switch (effect.type) {
      case "publish":
        try {
          const adId = await repository.publishAd(user, effect.fields);
          logger.info({ t: "ad_published", user: user.user_id, ad_id: adId }, "ad published");
          return next;
        } catch (e) {
          if (!(e instanceof StoreError)) throw e;
          logger.error({ err: e, user: user.user_id, operation: e.operation }, "publish failed");
          // Keep the draft so re-sending the date retries the save.
          return { session: current, replies: [{ text: TEXT.publishFailed }] };
        }
      case "verify_owner":
        try {
          await requireOwnedAd(repository, effect.adId, user.user_id);
          return next;
        } catch (e) {
          if (!(e instanceof NotFoundError) && !(e instanceof AuthorizationMismatchError)) throw e;
          logger.info({ t: "edit_rejected", user: user.user_id, ad_id: effect.adId, reason: e.code }, "edit rejected");
          return { session: undefined, replies: [{ text: TEXT.adNotFound }] };
        }
      case "update":
        try {
          const affected = await repository.updateAdField(effect.adId, user.user_id, effect.field, effect.value);
          if (affected === 0) {
            logger.info({ t: "edit_rejected", user: user.user_id, ad_id: effect.adId, reason: "no_rows" }, "edit rejected");
            return { session: undefined, replies: [{ text: TEXT.adNotFound }] };
          }
          return next;
        } catch (e) {
          if (!(e instanceof StoreError)) throw e;
          logger.error({ err: e, user: user.user_id, operation: e.operation }, "update failed");
          return { session: current, replies: [{ text: TEXT.updateFailed }] };
        }
    }
  }
}
