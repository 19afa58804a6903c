import { describe, expect, it } from "vitest";

import type { IdentifiedSessionToken } from "@sessionguard/contracts";

import { identifiedSessionTokenSchema } from "./schemas.js";
import { sampleToken } from "./test-fixtures.js";
import { deserializeToken, serializeToken } from "./token-serializer.js";

describe("token serialization", () => {
  it("drops fields the schema does not know", () => {
    const extended = { ...sampleToken, role: "admin" };
    const bytes = serializeToken<IdentifiedSessionToken>(extended, identifiedSessionTokenSchema);

    expect(JSON.parse(bytes.toString("utf8"))).toEqual(sampleToken);
  });

  it("rejects a negative generation", () => {
    const bytes = Buffer.from(JSON.stringify({ ...sampleToken, generation: -1 }), "utf8");

    const result = deserializeToken(bytes, identifiedSessionTokenSchema);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("envelope.invalid");
      expect(result.error.details).toEqual({ issues: ["generation"] });
    }
  });

  it("rejects bytes that are not JSON", () => {
    const result = deserializeToken(Buffer.from("{", "utf8"), identifiedSessionTokenSchema);

    expect(result.ok ? undefined : result.error.code).toBe("envelope.invalid");
  });
});
