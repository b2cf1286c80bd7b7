import type {
  NodeHandle,
  SearchArena
} from './SearchArena.ts';

export function reconstructPath<S>(arena: SearchArena<S>, terminal: NodeHandle): S[] {
  const path: S[] = [];
  let handle: NodeHandle | null = terminal;
  while (handle !== null) {
    const node = arena.get(handle);
    path.push(node.state);
    handle = node.parent;
  }
  return path.reverse();
}
