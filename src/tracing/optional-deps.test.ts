/**
 * optional-deps.test.ts - Unit tests for loading optional packages
 */

import { describe, it, expect } from "vitest";
import { loadOptional } from "./optional-deps";

describe("loadOptional", () => {
  it("returns an installed package", () => {
    const zod = loadOptional<typeof import("zod")>("zod");

    expect(zod?.z.string().parse("pod")).toBe("pod");
  });

  it("returns null for a package that is not installed", () => {
    expect(loadOptional("kube-query-not-installed")).toBeNull();
  });
});
