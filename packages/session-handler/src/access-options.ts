/** Per-call switches for reading the session. */
export interface SessionAccessOptions {
  /** Refresh the token even if it is not yet due. */
  readonly forceRefresh?: boolean;
  /** Accept requests that omit the user ID precondition. */
  readonly optionalUserIdPrecondition?: boolean;
  /** Skip the trusted-origin check. Multiple origin headers are still rejected. */
  readonly allowAllOrigins?: boolean;
}

export type ResolvedSessionAccessOptions = Required<SessionAccessOptions>;

export const FORCED_ACCESS_FLAGS = {
  "force-refresh": "forceRefresh",
  "optional-user-id-precondition": "optionalUserIdPrecondition",
  "allow-all-origins": "allowAllOrigins",
} as const satisfies Record<string, keyof SessionAccessOptions>;

export type ForcedAccessFlag = keyof typeof FORCED_ACCESS_FLAGS;

export const mergeAccessOptions = (
  options: SessionAccessOptions | undefined,
  forced: SessionAccessOptions,
): ResolvedSessionAccessOptions => ({
  forceRefresh: Boolean(options?.forceRefresh || forced.forceRefresh),
  optionalUserIdPrecondition: Boolean(options?.optionalUserIdPrecondition || forced.optionalUserIdPrecondition),
  allowAllOrigins: Boolean(options?.allowAllOrigins || forced.allowAllOrigins),
});

export const accessOptionsFromFlags = (flags: ReadonlyArray<ForcedAccessFlag>): SessionAccessOptions => {
  const options: { -readonly [K in keyof SessionAccessOptions]: SessionAccessOptions[K] } = {};
  for (const flag of flags) {
    options[FORCED_ACCESS_FLAGS[flag]] = true;
  }
  return options;
};
