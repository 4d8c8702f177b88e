/**
 * Topology capabilities consumed by the kernel.
 *
 * The kernel never looks inside points or sets. A space supplies membership,
 * closure and complements; an oracle supplies normality. Concrete spaces live
 * under ./spaces/.
 *
 *   P: point type, O: open set type, K: closed set type
 */

export interface Space<P, O, K> {
  /** Human-readable name for readback. */
  readonly name: string;

  inOpen(set: O, p: P): boolean;
  inClosed(set: K, p: P): boolean;

  /**
   * A closed superset of `set`. The oracle contract `closure(V) ⊆ U` is
   * stated against this operator, so it may return more than the
   * topological closure.
   */
  closure(set: O): K;

  complementOfOpen(set: O): K;
  complementOfClosed(set: K): O;

  intersect(a: O, b: O): O;

  /** The whole space as an open set. */
  whole(): O;

  /**
   * Decide `closed ⊆ open`. Optional: spaces where inclusion is undecidable
   * (level sets of arbitrary fields) leave it out and the kernel skips the
   * corresponding contract checks.
   */
  subset?(closed: K, open: O): boolean;

  /** Optional shape checks used to reject a malformed root. */
  isOpen?(set: O): boolean;
  isClosed?(set: K): boolean;

  describeOpen?(set: O): string;
  describeClosed?(set: K): string;
}

/**
 * Normality oracle. For `C ⊆ U` returns an open `V` with
 * `C ⊆ V` and `closure(V) ⊆ U`.
 */
export interface NormalityOracle<O, K> {
  separate(closed: K, open: O): O;
}
