import { ResourceCategory } from '../resource/entities/resource.entity';

/**
 * Who is asking for a status change. Users carry the categories the
 * authorization layer lets them approve; the engine does no role logic.
 */
export type BookingActor =
  | {
      kind: 'user';
      userId: string;
      approvableCategories: ReadonlySet<ResourceCategory>;
    }
  | { kind: 'system' };

export const SYSTEM_ACTOR: BookingActor = { kind: 'system' };

export const actorLabel = (actor: BookingActor): string =>
  actor.kind === 'system' ? 'system' : actor.userId;
