import type { BatchResult, RevisionToken } from "../batch/types.js";
import type { ParsedDocument } from "../document/types.js";
import type { WireRequest } from "../operations/types.js";

/**
 * Remote document store. Implementations own transport, auth, retries and
 * timeouts; failures are thrown and classified by the caller.
 */
export interface DocumentService {
  fetchDocument(documentId: string): Promise<ParsedDocument>;
  /** Metadata-only read of the live revision marker */
  fetchRevision(documentId: string): Promise<RevisionToken>;
  /** Atomic: either every request lands or the whole batch is rejected */
  submitBatch(
    documentId: string,
    requests: WireRequest[],
    requiredRevision?: RevisionToken
  ): Promise<BatchResult>;
}
