import type { IdentifiedSessionToken } from "@sessionguard/contracts";

export const sampleToken: IdentifiedSessionToken = {
  sessionId: "session-1",
  userId: "user-1",
  refreshedAt: "2026-03-01T12:00:00.000Z",
  refreshAfterSeconds: 300,
  validForSeconds: 86400,
  generation: 3,
  isPersistent: false,
};
