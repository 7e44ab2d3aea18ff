import type { Handler, Matcher, RouteOptions, RouteSpec } from "./types";

export interface RouteEntry {
  readonly matcher: Matcher;
  readonly handler: Handler;
  readonly options: RouteOptions;
}

export interface RouteHit {
  readonly entry: RouteEntry;
  // null for an exact string match
  readonly match: RegExpExecArray | null;
}

// lastIndex on a g/y regexp would be shared by every connection
function statelessPattern(re: RegExp): RegExp {
  if (!re.global && !re.sticky) return re;
  return new RegExp(re.source, re.flags.replace(/[gy]/g, ""));
}

export class RouteTable {
  private readonly entries: RouteEntry[] = [];

  constructor(specs: readonly RouteSpec[] = []) {
    for (const [matcher, handler, options] of specs) {
      this.add(matcher, handler, options);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  add(matcher: Matcher, handler: Handler, options: RouteOptions = {}): void {
    const m = typeof matcher === "string" ? matcher : statelessPattern(matcher);
    this.entries.push({ matcher: m, handler, options: { ...options } });
  }

  resolve(path: string): RouteHit | null {
    for (const entry of this.entries) {
      const { matcher } = entry;
      if (path === matcher) {
        return { entry, match: null };
      }
      if (typeof matcher !== "string") {
        const m = matcher.exec(path);
        if (m) return { entry, match: m };
      }
    }
    return null;
  }
}
