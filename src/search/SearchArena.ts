import { ensureNonNullable } from '../typeGuards.ts';

export type NodeHandle = number;

export interface SearchNode<S> {
  readonly depth: number;
  readonly parent: NodeHandle | null;
  readonly state: S;
}

/**
 * Per-run storage of search nodes. Nodes refer to their parents by handle, so
 * the parent chain holds no object cycles.
 */
export class SearchArena<S> {
  public get size(): number {
    return this.nodes.length;
  }

  private readonly nodes: SearchNode<S>[] = [];

  public add(state: S, parent: NodeHandle | null): NodeHandle {
    const depth = parent === null ? 0 : this.get(parent).depth + 1;
    this.nodes.push({ depth, parent, state });
    return this.nodes.length - 1;
  }

  public get(handle: NodeHandle): SearchNode<S> {
    return ensureNonNullable(this.nodes[handle], `Unknown search node handle: ${String(handle)}`);
  }

  /**
   * Drops every node from `length` onwards. Depth-first search uses this to
   * release an abandoned branch.
   */
  public truncate(length: number): void {
    if (length < this.nodes.length) {
      this.nodes.length = length;
    }
  }
}
