export interface MountEntry<T> {
  readonly prefix: string;
  readonly target: T;
}

// longest prefix first; equal lengths keep insertion order
export class MountTable<T> {
  private entries: MountEntry<T>[] = [];

  get size(): number {
    return this.entries.length;
  }

  add(prefix: string, target: T): void {
    // every mount must strip at least one path character
    if (!prefix.startsWith("/") || prefix.length < 2) {
      throw new Error(`invalid mount prefix: "${prefix}"`);
    }
    this.entries.push({ prefix, target });
    this.entries.sort((a, b) => b.prefix.length - a.prefix.length);
  }

  longestPrefix(path: string): MountEntry<T> | null {
    for (const entry of this.entries) {
      if (path.startsWith(entry.prefix)) return entry;
    }
    return null;
  }

  targets(): T[] {
    return this.entries.map((e) => e.target);
  }
}
