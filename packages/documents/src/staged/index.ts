// Staged document - buffers writes over another document
//
// Reads and writes go to an in-memory overlay seeded from the base document
// on first access, so staged writes are visible to later staged reads.
// Every write is journaled; commit() replays the journal onto the base inside
// one base transaction, rollback() discards it.

import { cloneNodeValue, isNodeMap, type NodeValue, type Path } from '@docmap/protocol';
import type { Document } from '../interfaces/index.js';
import { createInMemoryDocument, type InMemoryDocument } from '../in-memory/index.js';
import { DocumentClosedError } from '../errors.js';

export type StagedDocumentState = 'open' | 'committed' | 'rolled back';

export type StagedWrite =
  | { op: 'put'; path: Path; value: NodeValue }
  | { op: 'delete'; path: Path };

export type StagedDocument = Document & {
  readonly state: StagedDocumentState;

  /** Writes journaled so far */
  readonly writes: readonly StagedWrite[];

  /** Apply every staged write to the base document */
  commit(): void;

  /** Discard every staged write */
  rollback(): void;
};

export function createStagedDocument(base: Document): StagedDocument {
  const journal: StagedWrite[] = [];
  let overlay: InMemoryDocument | undefined;
  let state: StagedDocumentState = 'open';

  const current = (): InMemoryDocument => {
    if (state !== 'open') {
      throw new DocumentClosedError(state);
    }
    if (overlay === undefined) {
      const rootValue = base.get([]);
      overlay = createInMemoryDocument(isNodeMap(rootValue) ? rootValue : {});
    }
    return overlay;
  };

  return {
    get state() {
      return state;
    },

    get writes() {
      return journal;
    },

    get(path) {
      return current().get(path);
    },

    put(path, value) {
      // Rejected writes never reach the journal
      current().put(path, value);
      journal.push({ op: 'put', path: [...path], value: cloneNodeValue(value) });
    },

    delete(path) {
      current().delete(path);
      journal.push({ op: 'delete', path: [...path] });
    },

    listKeys(path) {
      return current().listKeys(path);
    },

    listItems(path) {
      return current().listItems(path);
    },

    nodeKind(path) {
      return current().nodeKind(path);
    },

    transact(fn) {
      current();
      return fn();
    },

    commit() {
      if (state !== 'open') {
        throw new DocumentClosedError(state);
      }
      base.transact(() => {
        for (const write of journal) {
          if (write.op === 'put') {
            base.put(write.path, write.value);
          } else {
            base.delete(write.path);
          }
        }
      });
      state = 'committed';
      overlay = undefined;
    },

    rollback() {
      if (state !== 'open') {
        throw new DocumentClosedError(state);
      }
      journal.length = 0;
      state = 'rolled back';
      overlay = undefined;
    },
  };
}
