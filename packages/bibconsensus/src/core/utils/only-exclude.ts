/**
 * Only/Exclude Filter
 *
 * A membership test defined either by a list of allowed values or by a list of
 * excluded values. `only` wins when both are given; an empty `only` list admits
 * nothing, so callers that read optional CLI lists should go through
 * `fromNonEmpty`.
 *
 * @module core/utils/only-exclude
 */

export class OnlyExclude<T> {
  constructor(
    private readonly only: readonly T[] | null,
    private readonly exclude: readonly T[] | null
  ) {}

  /**
   * Treat empty lists as "not given"
   */
  static fromNonEmpty<T>(only: readonly T[] = [], exclude: readonly T[] = []): OnlyExclude<T> {
    return new OnlyExclude(only.length > 0 ? only : null, exclude.length > 0 ? exclude : null);
  }

  static all<T>(): OnlyExclude<T> {
    return new OnlyExclude<T>(null, null);
  }

  has(value: T): boolean {
    if (this.only !== null) return this.only.includes(value);
    if (this.exclude !== null) return !this.exclude.includes(value);
    return true;
  }

  filter<Q>(items: Iterable<Q>, map: (item: Q) => T): Q[] {
    const kept: Q[] = [];
    for (const item of items) {
      if (this.has(map(item))) kept.push(item);
    }
    return kept;
  }

  /**
   * Filter values that matched nothing in `seen`, for "no such entry" warnings
   */
  unused(seen: Iterable<T>): { readonly only: ReadonlySet<T>; readonly exclude: ReadonlySet<T> } {
    const seenSet = new Set(seen);
    const unusedOf = (list: readonly T[] | null): Set<T> =>
      new Set((list ?? []).filter((value) => !seenSet.has(value)));

    if (this.only !== null) {
      return { only: unusedOf(this.only), exclude: new Set(this.exclude ?? []) };
    }
    return { only: new Set(), exclude: unusedOf(this.exclude) };
  }
}
