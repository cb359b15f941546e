// Document error types

import { formatPath, type Path } from '@docmap/protocol';

/**
 * Error when a write or listing meets a node of the wrong kind.
 */
export class DocumentShapeError extends Error {
  readonly code = 'DOCUMENT_SHAPE';
  readonly path: Path;

  constructor(path: Path, reason: string) {
    super(`Cannot address ${formatPath(path)}: ${reason}`);
    this.name = 'DocumentShapeError';
    this.path = path;
  }
}

/**
 * Error when a staged document is used after commit or rollback.
 */
export class DocumentClosedError extends Error {
  readonly code = 'DOCUMENT_CLOSED';

  constructor(state: string) {
    super(`Staged document is already ${state}`);
    this.name = 'DocumentClosedError';
  }
}
