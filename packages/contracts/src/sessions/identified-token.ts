import type { IdentifiedSessionToken, SessionRecord } from "../types/session.js";

export const DEFAULT_REFRESH_AFTER_SECONDS = 300;

export const toIdentifiedSessionToken = (
  record: SessionRecord,
  refreshAfterSeconds: number = DEFAULT_REFRESH_AFTER_SECONDS,
): IdentifiedSessionToken => ({
  sessionId: record.id,
  userId: record.userId,
  refreshedAt: record.refreshedAt,
  refreshAfterSeconds,
  validForSeconds: record.validForSeconds,
  generation: record.generation,
  isPersistent: record.isPersistent,
});
