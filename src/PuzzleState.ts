/**
 * The contract every puzzle variant implements and the only vocabulary the
 * search core speaks.
 *
 * States are immutable: every extension is a new object, so several search
 * branches may share an ancestor.
 */
export interface PuzzleState<TSelf extends PuzzleState<TSelf>> {
  /**
   * Canonical key. Two states are equal iff their keys are equal; solvers use
   * it for visited-set membership.
   */
  readonly key: string;

  equals(other: TSelf): boolean;

  /**
   * All states reachable by exactly one legal move, in a deterministic order.
   * Never yields the state itself. Calling it again restarts the sequence.
   */
  extensions(): Iterable<TSelf>;

  /**
   * Cheap, sound unsolvability test: `true` proves no solution is reachable,
   * `false` promises nothing.
   */
  failFast(): boolean;

  isSolved(): boolean;

  toString(): string;
}
