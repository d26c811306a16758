import { buildBatch, renderBatch } from "../batch/sequencer.js";
import type { SubmitOutcome } from "../batch/types.js";
import { findSection } from "../document/parse.js";
import type { ParsedDocument, SectionLocation } from "../document/types.js";
import { DocEditError } from "../errors.js";
import { lowerMarkdown } from "../markdown/lowering.js";
import { createSilentLogger, type RuntimeLogger } from "../observability/logger.js";
import { describeOperation } from "../operations/operation.js";
import type {
  BulletPreset,
  CharStyle,
  LogicalOperation,
  ParagraphStyle,
  WireRequest,
} from "../operations/types.js";
import type { DocumentService } from "../service/types.js";
import {
  classifyRemoteError,
  type RevisionMode,
  resolveRequiredRevision,
} from "../staleness/guard.js";
import { assertPosition, type Position } from "../text/utf16.js";

export type EditOptions = RevisionMode;

export interface InsertInput {
  index: Position;
  text: string;
  paragraphStyle?: ParagraphStyle;
  bulletPreset?: BulletPreset;
  charStyle?: CharStyle;
}

export interface DocumentEditorOptions {
  logger?: RuntimeLogger;
}

export const NOOP_MESSAGE = "No operations to execute";

/**
 * Runs one command against a document: validate, sequence, attach the
 * revision precondition, submit once.
 */
export class DocumentEditor {
  private readonly service: DocumentService;
  private readonly logger: RuntimeLogger;

  constructor(service: DocumentService, options: DocumentEditorOptions = {}) {
    this.service = service;
    this.logger = (options.logger ?? createSilentLogger()).child({ module: "editor" });
  }

  async read(documentId: string): Promise<ParsedDocument> {
    try {
      return await this.service.fetchDocument(documentId);
    } catch (error) {
      throw classifyRemoteError(error, "Fetch document");
    }
  }

  async findSection(documentId: string, headingText: string): Promise<SectionLocation> {
    const document = await this.read(documentId);
    const section = findSection(document, headingText);
    if (!section) {
      throw new DocEditError("SECTION_NOT_FOUND", `Section with heading '${headingText}' not found`, {
        context: { documentId, headingText },
      });
    }
    return section;
  }

  insert(documentId: string, input: InsertInput, options: EditOptions = {}): Promise<SubmitOutcome> {
    return this.submit(
      documentId,
      [
        {
          kind: "insert",
          at: input.index,
          text: input.text,
          paragraphStyle: input.paragraphStyle,
          bulletPreset: input.bulletPreset,
          charStyle: input.charStyle,
        },
      ],
      options
    );
  }

  delete(
    documentId: string,
    start: Position,
    end: Position,
    options: EditOptions = {}
  ): Promise<SubmitOutcome> {
    return this.submit(documentId, [{ kind: "delete", start, end }], options);
  }

  replace(
    documentId: string,
    start: Position,
    end: Position,
    text: string,
    options: EditOptions = {}
  ): Promise<SubmitOutcome> {
    return this.submit(documentId, [{ kind: "replace", start, end, text }], options);
  }

  /** Validates and sequences every operation before anything is sent. */
  async submit(
    documentId: string,
    ops: readonly LogicalOperation[],
    options: EditOptions = {}
  ): Promise<SubmitOutcome> {
    const batch = buildBatch(ops);
    this.logger.debug("Sequenced batch", {
      documentId,
      operations: batch.operations.map((op) => describeOperation(op)),
    });
    return this.submitRequests(documentId, renderBatch(batch), options);
  }

  async insertMarkdown(
    documentId: string,
    index: Position,
    markdown: string,
    options: EditOptions = {}
  ): Promise<SubmitOutcome> {
    assertPosition(index, "index");
    const lowering = lowerMarkdown(markdown, index);
    this.logger.debug("Lowered markdown", { documentId, totalLength: lowering.totalLength });
    return this.submitRequests(documentId, lowering.requests, options);
  }

  private async submitRequests(
    documentId: string,
    requests: WireRequest[],
    options: EditOptions
  ): Promise<SubmitOutcome> {
    if (requests.length === 0) {
      return { status: "noop", message: NOOP_MESSAGE };
    }

    // Dry runs never fetch: only an explicit token shows up in the preview
    const requiredRevision = await resolveRequiredRevision(this.service, documentId, options);
    if (options.dryRun) {
      return {
        status: "dry_run",
        preview: requiredRevision
          ? { dryRun: true, requests, requiredRevision }
          : { dryRun: true, requests },
      };
    }

    this.logger.info("Submitting batch", {
      documentId,
      requestCount: requests.length,
      requiredRevision,
    });

    try {
      const result = await this.service.submitBatch(documentId, requests, requiredRevision);
      return { status: "applied", result, requestCount: requests.length };
    } catch (error) {
      const classified = classifyRemoteError(error);
      this.logger.warn("Batch rejected", { documentId, code: classified.code });
      throw classified;
    }
  }
}
