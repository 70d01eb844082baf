/**
 * Fresh variable names for alpha-renaming.
 *
 * @module
 */

const TRAILING_DIGITS = /[0-9]+$/;

/**
 * Hands out names of the form `<stem><n>`, where the stem is the requested
 * base name without trailing digits (`y`, `y0` and `y12` all share the stem
 * `y`). Each stem has its own counter, which only ever increases, so a
 * supply never returns the same name twice.
 *
 * A supply belongs to one reduction run; it is not shared between runs.
 *
 * Substitution only treats free names as taken: the substituted parameter,
 * and the free variables of the argument and of the renamed binder's body.
 * A fresh name may therefore equal a binder further inside the body. When
 * that inner binder would capture the renamed variable, substitution renames
 * it in turn, so no capture results.
 */
export class FreshNameSupply {
  private readonly counters = new Map<string, number>();

  /**
   * @param base the name being replaced.
   * @param isTaken reports whether a candidate collides with a name in scope.
   * @returns the first untaken candidate for the base's stem.
   */
  fresh(base: string, isTaken: (candidate: string) => boolean): string {
    const stem = base.replace(TRAILING_DIGITS, "");
    let counter = this.counters.get(stem) ?? 0;
    let candidate = `${stem}${counter}`;
    while (isTaken(candidate)) {
      counter++;
      candidate = `${stem}${counter}`;
    }
    this.counters.set(stem, counter + 1);
    return candidate;
  }
}
