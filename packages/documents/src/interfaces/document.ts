import type { NodeKind, NodeValue, Path } from '@docmap/protocol';

/**
 * Addressable document tree consumed by the mapping runtime.
 *
 * Implementations wrap a concrete store (in-memory tree, Yjs document, ...).
 * The runtime never holds a private copy of the tree: every read and write
 * goes through this interface. Merge and conflict semantics belong to the
 * store, not to this contract.
 */
export interface Document {
  /**
   * Materialized value at `path`, or undefined when absent.
   * The returned value is a copy.
   */
  get(path: Path): NodeValue | undefined;

  /**
   * Write `value` at `path`.
   *
   * Missing intermediate maps are created. Throws DocumentShapeError when an
   * intermediate segment exists but is not a map (or a list addressed by an
   * in-range index). On a list, an index below the length replaces the item
   * and an index equal to the length appends.
   */
  put(path: Path, value: NodeValue): void;

  /**
   * Remove the map key or list item at `path`. Absent paths are a no-op.
   */
  delete(path: Path): void;

  /**
   * Keys of the map at `path`; empty when absent.
   * Throws DocumentShapeError when the node is not a map.
   */
  listKeys(path: Path): string[];

  /**
   * Items of the list at `path`; empty when absent.
   * Throws DocumentShapeError when the node is not a list.
   */
  listItems(path: Path): NodeValue[];

  nodeKind(path: Path): NodeKind;

  /**
   * Run `fn` so that its writes form one change in the store.
   */
  transact<R>(fn: () => R): R;
}
