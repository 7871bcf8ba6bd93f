import type { DataAccess } from '../contracts/store';
import type { Logger } from '../logger';

/** Collaborators handed to one job run. */
export interface JobDependencies {
  store: DataAccess;
  logger: Logger;
}

export interface JobRunOptions {
  /** Aborted by the worker when the run exceeds its budget. */
  signal?: AbortSignal;
}
