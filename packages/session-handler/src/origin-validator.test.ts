import { describe, expect, it } from "vitest";

import { OriginValidator } from "./origin-validator.js";

describe("OriginValidator", () => {
  const validator = new OriginValidator(["app.example.com", "*.example.org", "LOCALHOST"]);

  it("matches exact hosts case-insensitively", () => {
    expect(validator.isAllowed("https://app.example.com")).toBe(true);
    expect(validator.isAllowed("https://APP.Example.com:8443")).toBe(true);
    expect(validator.isAllowed("http://localhost:3000")).toBe(true);
    expect(validator.isAllowed("https://www.example.com")).toBe(false);
  });

  it("matches wildcard patterns by suffix only", () => {
    expect(validator.isAllowed("https://api.example.org")).toBe(true);
    expect(validator.isAllowed("https://deep.api.example.org")).toBe(true);
    expect(validator.isAllowed("https://example.org")).toBe(false);
    expect(validator.isAllowed("https://badexample.org")).toBe(false);
  });

  it("rejects origins that are not absolute URLs", () => {
    expect(validator.isAllowed("app.example.com")).toBe(false);
    expect(validator.isAllowed("null")).toBe(false);
    expect(validator.isAllowed("")).toBe(false);
  });

  it("allows nothing without patterns", () => {
    expect(new OriginValidator([]).isAllowed("https://app.example.com")).toBe(false);
  });
});
