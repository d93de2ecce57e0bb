import { createHash } from "node:crypto";

const DEFAULT_WINDOW_MS = 1000;

/** Flags identical bodies from the same peer arriving within a short window. */
export class DuplicateDetector {
  private readonly seen = new Map<string, number>();
  private readonly now: () => number;

  constructor(
    private readonly windowMs = DEFAULT_WINDOW_MS,
    now?: () => number,
  ) {
    this.now = now ?? Date.now;
  }

  check(body: string, remoteAddress: string | undefined): boolean {
    const now = this.now();
    this.prune(now);
    const key = createHash("sha256")
      .update(`${remoteAddress ?? "unknown"}\n${body}`)
      .digest("hex");
    const previous = this.seen.get(key);
    this.seen.set(key, now);
    return previous !== undefined && now - previous < this.windowMs;
  }

  private prune(now: number): void {
    for (const [key, at] of this.seen) {
      if (now - at >= this.windowMs) {
        this.seen.delete(key);
      }
    }
  }
}

export function createRequestIdGenerator(): () => string {
  let counter = 0;
  return () => {
    counter += 1;
    return String(counter).padStart(6, "0");
  };
}
