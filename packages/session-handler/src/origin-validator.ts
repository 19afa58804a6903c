import type { OriginValidatorPort } from "@sessionguard/contracts";

/**
 * Matches a request origin's host against trusted host patterns. A pattern
 * starting with `*` matches any host ending in the rest of the pattern, so
 * `*.example.com` covers `api.example.com` but not `example.com`.
 */
export class OriginValidator implements OriginValidatorPort {
  private readonly patterns: ReadonlyArray<string>;

  constructor(trustedOrigins: ReadonlyArray<string>) {
    this.patterns = trustedOrigins
      .map((pattern) => pattern.trim().toLowerCase())
      .filter((pattern) => pattern.length > 0);
  }

  isAllowed(origin: string): boolean {
    let host: string;
    try {
      host = new URL(origin).hostname.toLowerCase();
    } catch {
      return false;
    }

    if (host.length === 0) {
      return false;
    }

    for (const pattern of this.patterns) {
      const matches = pattern.startsWith("*") ? host.endsWith(pattern.slice(1)) : host === pattern;
      if (matches) {
        return true;
      }
    }

    return false;
  }
}

export const createOriginValidator = (trustedOrigins: ReadonlyArray<string>): OriginValidatorPort =>
  new OriginValidator(trustedOrigins);
