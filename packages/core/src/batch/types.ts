import type { PrimitiveOperation, WireRequest } from "../operations/types.js";

/** Opaque document revision marker used as an optimistic-concurrency precondition */
export type RevisionToken = string;

export type Batch = {
  /** Execution order; see `sequenceOperations` */
  operations: PrimitiveOperation[];
  requiredRevision?: RevisionToken;
};

export type WriteControl = {
  requiredRevisionId?: RevisionToken;
  targetRevisionId?: RevisionToken;
};

/** What the document service reports after applying a batch */
export type BatchResult = {
  documentId: string;
  replies: unknown[];
  writeControl?: WriteControl;
};

export type DryRunPreview = {
  dryRun: true;
  requests: WireRequest[];
  requiredRevision?: RevisionToken;
};

export type SubmitOutcome =
  | { status: "noop"; message: string }
  | { status: "dry_run"; preview: DryRunPreview }
  | { status: "applied"; result: BatchResult; requestCount: number };
