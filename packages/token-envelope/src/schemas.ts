import { z } from "zod";

import type { SessionToken } from "@sessionguard/contracts";

export type TokenSchema<TToken extends SessionToken> = z.ZodType<TToken, z.ZodTypeDef, unknown>;

export const sessionTokenSchema = z.object({
  userId: z.string().min(1),
  refreshedAt: z.string().datetime(),
  refreshAfterSeconds: z.number().int().nonnegative(),
  validForSeconds: z.number().int().positive(),
  generation: z.number().int().nonnegative(),
  isPersistent: z.boolean(),
});

export const identifiedSessionTokenSchema = sessionTokenSchema.extend({
  sessionId: z.string().min(1),
});
