/**
 * Captured path parameters for one request
 */
export class PathParams implements Iterable<[string, string]> {
  private static readonly EMPTY = new PathParams([]);

  private readonly values: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]>) {
    this.values = new Map(entries);
    Object.freeze(this);
  }

  static empty(): PathParams {
    return PathParams.EMPTY;
  }

  /**
   * Name the positional captures of a match. Unnamed captures are dropped.
   */
  static fromCaptures(
    names: readonly (string | undefined)[],
    values: readonly string[],
  ): PathParams {
    const entries: [string, string][] = [];
    names.forEach((name, i) => {
      if (name !== undefined) {
        entries.push([name, values[i] ?? '']);
      }
    });
    return entries.length === 0 ? PathParams.EMPTY : new PathParams(entries);
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.values.entries();
  }

  toObject(): Record<string, string> {
    return Object.fromEntries(this.values);
  }
}
