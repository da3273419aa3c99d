import { existsSync } from "node:fs";
import { extname, join, resolve } from "node:path";
import { RenameError } from "./errors.js";

export const DEFAULT_MAX_ATTEMPTS = 10_000;

export interface CollisionResolverOptions {
  maxAttempts?: number;
  /** Filesystem probe, swappable for tests */
  exists?: (path: string) => boolean;
}

/**
 * Hands out destination paths that are free both on disk and among the paths
 * already given out in this run. One resolver per batch run.
 */
export class CollisionResolver {
  private readonly claimed = new Set<string>();
  private readonly maxAttempts: number;
  private readonly exists: (path: string) => boolean;

  constructor(options: CollisionResolverOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.exists = options.exists ?? existsSync;
  }

  /**
   * Claim `dir/fileName`, or `dir/base (n).ext` for the smallest free n >= 1.
   * `ownPath` counts as free even though it exists: in-place renames pass the
   * source file so an already correctly named file resolves to itself.
   */
  resolve(fileName: string, dir: string, ownPath?: string): string {
    const ext = extname(fileName);
    const base = ext ? fileName.slice(0, -ext.length) : fileName;
    const own = ownPath ? resolve(ownPath) : null;

    for (let n = 0; n <= this.maxAttempts; n++) {
      const name = n === 0 ? fileName : `${base} (${n})${ext}`;
      const candidate = resolve(join(dir, name));
      if (this.claimed.has(candidate)) continue;
      if (candidate !== own && this.exists(candidate)) continue;

      this.claimed.add(candidate);
      return candidate;
    }

    throw new RenameError(
      "CollisionExhausted",
      `No free name for "${fileName}" after ${this.maxAttempts} attempts`
    );
  }

  /** Give a claimed path back, e.g. after the rename or copy failed */
  release(path: string): void {
    this.claimed.delete(resolve(path));
  }

  isClaimed(path: string): boolean {
    return this.claimed.has(resolve(path));
  }

  get size(): number {
    return this.claimed.size;
  }
}
