/**
 * Staleness Guard
 *
 * Attaches a revision precondition to a batch so the service rejects the
 * whole batch if the document changed after the token was captured.
 */

import type { RevisionToken, WriteControl } from "../batch/types.js";
import { DocEditError, getErrorMessage, isDocEditError } from "../errors.js";
import type { DocumentService } from "../service/types.js";

export const STALE_DOCUMENT_HINT = "Re-read the document or force the edit with --force.";

export type RevisionMode = {
  /** Skip the precondition entirely */
  force?: boolean;
  /** Preview only; nothing is fetched or submitted */
  dryRun?: boolean;
  /** Caller-supplied token, e.g. the revisionId from an earlier read */
  revision?: RevisionToken;
};

/**
 * Resolves the token for one submission. An explicit token wins; force and
 * dry-run attach none; otherwise the live revision is read. A failed read
 * fails the command rather than dropping the precondition.
 */
export async function resolveRequiredRevision(
  service: DocumentService,
  documentId: string,
  mode: RevisionMode = {}
): Promise<RevisionToken | undefined> {
  if (mode.revision) {
    return mode.revision;
  }
  if (mode.force || mode.dryRun) {
    return undefined;
  }
  try {
    return await service.fetchRevision(documentId);
  } catch (error) {
    if (isDocEditError(error)) {
      throw error;
    }
    throw new DocEditError(
      "REMOTE_OPERATION_FAILED",
      `Could not read the document revision: ${getErrorMessage(error)}`,
      { cause: error, context: { documentId } }
    );
  }
}

export function toWriteControl(requiredRevision?: RevisionToken): WriteControl | undefined {
  return requiredRevision ? { requiredRevisionId: requiredRevision } : undefined;
}

// The Docs API exposes no structured code for a revision mismatch, so the
// message text is the only signal.
const STALE_PATTERNS: readonly RegExp[] = [
  /requiredRevisionId/,
  /required revision/i,
  /document has been modified/i,
];

export function isStaleDocumentMessage(message: string): boolean {
  return STALE_PATTERNS.some((pattern) => pattern.test(message));
}

/** Single classification point for failures reported by the document service. */
export function classifyRemoteError(error: unknown, operation = "Batch update"): DocEditError {
  if (isDocEditError(error)) {
    return error;
  }
  const message = getErrorMessage(error);
  if (isStaleDocumentMessage(message)) {
    return new DocEditError(
      "STALE_DOCUMENT",
      `Document was modified since it was last read. ${message}`,
      { cause: error, hint: STALE_DOCUMENT_HINT }
    );
  }
  return new DocEditError("REMOTE_OPERATION_FAILED", `${operation} failed: ${message}`, {
    cause: error,
  });
}
