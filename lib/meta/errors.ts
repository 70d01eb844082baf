/**
 * Errors raised between parsing and reduction.
 *
 * @module
 */

/**
 * Raised by a strict unroll when the program refers to names that no
 * definition or enclosing abstraction binds.
 */
export class UnboundReferenceError extends Error {
  constructor(public readonly names: readonly string[]) {
    super(`unbound reference${names.length === 1 ? "" : "s"}: ${names.join(", ")}`);
    this.name = "UnboundReferenceError";
  }
}
