import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { CollisionResolver } from "../../src/core/collision.js";
import { RenameError } from "../../src/core/errors.js";
import { makeTempDir } from "./helpers.js";

describe("Collision resolver", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir("renamer-collision-");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("hands out Report.pdf, Report (1).pdf, Report (2).pdf … in claim order", () => {
    const resolver = new CollisionResolver();
    const paths = Array.from({ length: 5 }, () => resolver.resolve("Report.pdf", dir));

    expect(paths).toEqual([
      join(dir, "Report.pdf"),
      join(dir, "Report (1).pdf"),
      join(dir, "Report (2).pdf"),
      join(dir, "Report (3).pdf"),
      join(dir, "Report (4).pdf"),
    ]);
    expect(new Set(paths).size).toBe(5);
    expect(resolver.size).toBe(5);
  });

  it("skips names that already exist on disk", () => {
    writeFileSync(join(dir, "Report.pdf"), "x");
    writeFileSync(join(dir, "Report (1).pdf"), "x");

    const resolver = new CollisionResolver();
    expect(resolver.resolve("Report.pdf", dir)).toBe(join(dir, "Report (2).pdf"));
    expect(resolver.resolve("Report.pdf", dir)).toBe(join(dir, "Report (3).pdf"));
  });

  it("does not touch the filesystem", () => {
    const resolver = new CollisionResolver({
      exists: () => {
        throw new Error("unexpected probe");
      },
    });
    expect(() => resolver.resolve("A.pdf", dir)).toThrow("unexpected probe");

    const pure = new CollisionResolver({ exists: () => false });
    pure.resolve("A.pdf", dir);
    expect(pure.isClaimed(join(dir, "A.pdf"))).toBe(true);
  });

  it("treats ownPath as free even though it exists", () => {
    const own = join(dir, "Report.pdf");
    writeFileSync(own, "x");

    const resolver = new CollisionResolver();
    expect(resolver.resolve("Report.pdf", dir, own)).toBe(own);
    // …but once claimed it is taken for everyone else
    expect(resolver.resolve("Report.pdf", dir, own)).toBe(join(dir, "Report (1).pdf"));
  });

  it("release makes a claimed name available again", () => {
    const resolver = new CollisionResolver({ exists: () => false });
    const first = resolver.resolve("Report.pdf", dir);
    resolver.release(first);
    expect(resolver.isClaimed(first)).toBe(false);
    expect(resolver.resolve("Report.pdf", dir)).toBe(first);
  });

  it("keeps the extension after the suffix", () => {
    const resolver = new CollisionResolver({ exists: () => false });
    resolver.resolve("v1.2 notes.pdf", dir);
    expect(resolver.resolve("v1.2 notes.pdf", dir)).toBe(join(dir, "v1.2 notes (1).pdf"));
  });

  it("throws CollisionExhausted past maxAttempts", () => {
    const resolver = new CollisionResolver({ maxAttempts: 2, exists: () => true });
    let caught: unknown;
    try {
      resolver.resolve("Report.pdf", dir);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(RenameError);
    expect(caught instanceof RenameError && caught.kind).toBe("CollisionExhausted");
  });
});
