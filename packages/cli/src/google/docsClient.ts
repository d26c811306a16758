/**
 * Docs API client
 *
 * Implements DocumentService over the Docs REST API with `fetch`. Responses
 * are validated before they reach the read model; failures surface as
 * DocsApiError and are classified by the editor.
 */

import {
  type BatchResult,
  DocEditError,
  type DocumentService,
  type ParsedDocument,
  parseDocumentStructure,
  parseGoogleDocument,
  type RevisionToken,
  type RuntimeLogger,
  createSilentLogger,
  toWriteControl,
  type WireRequest,
} from "@gdoc-editor/core";
import { z } from "zod";

export const DEFAULT_DOCS_API_BASE_URL = "https://docs.googleapis.com/v1";

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

export interface GoogleDocsServiceConfig {
  tokenProvider: AccessTokenProvider;
  baseUrl?: string;
  logger?: RuntimeLogger;
}

const RevisionResponseSchema = z.object({ revisionId: z.string() }).passthrough();

const BatchUpdateResponseSchema = z
  .object({
    documentId: z.string().optional(),
    replies: z.array(z.unknown()).optional(),
    writeControl: z
      .object({
        requiredRevisionId: z.string().optional(),
        targetRevisionId: z.string().optional(),
      })
      .optional(),
  })
  .passthrough();

const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});

export class DocsApiError extends Error {
  override readonly name = "DocsApiError";
  readonly status: number;
  readonly body: string;

  constructor(status: number, message: string, body: string) {
    super(message);
    this.status = status;
    this.body = body;
  }
}

export class GoogleDocsService implements DocumentService {
  private readonly tokenProvider: AccessTokenProvider;
  private readonly baseUrl: string;
  private readonly logger: RuntimeLogger;

  constructor(config: GoogleDocsServiceConfig) {
    this.tokenProvider = config.tokenProvider;
    this.baseUrl = (config.baseUrl ?? DEFAULT_DOCS_API_BASE_URL).replace(/\/+$/, "");
    this.logger = (config.logger ?? createSilentLogger()).child({ module: "docs-client" });
  }

  async fetchDocument(documentId: string): Promise<ParsedDocument> {
    const payload = await this.request("GET", this.documentUrl(documentId));
    return parseDocumentStructure(parseGoogleDocument(payload));
  }

  async fetchRevision(documentId: string): Promise<RevisionToken> {
    const url = new URL(this.documentUrl(documentId));
    url.searchParams.set("fields", "revisionId");
    const payload = await this.request("GET", url.toString());
    const parsed = RevisionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DocEditError("REMOTE_OPERATION_FAILED", "Docs API response is missing revisionId", {
        context: { documentId },
      });
    }
    return parsed.data.revisionId;
  }

  async submitBatch(
    documentId: string,
    requests: WireRequest[],
    requiredRevision?: RevisionToken
  ): Promise<BatchResult> {
    const writeControl = toWriteControl(requiredRevision);
    const payload = await this.request("POST", `${this.documentUrl(documentId)}:batchUpdate`, {
      requests,
      ...(writeControl ? { writeControl } : {}),
    });
    const parsed = BatchUpdateResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DocEditError("REMOTE_OPERATION_FAILED", "Unexpected batchUpdate response from the Docs API", {
        context: { documentId, issues: parsed.error.issues },
      });
    }
    return {
      documentId: parsed.data.documentId ?? documentId,
      replies: parsed.data.replies ?? [],
      ...(parsed.data.writeControl ? { writeControl: parsed.data.writeControl } : {}),
    };
  }

  private documentUrl(documentId: string): string {
    return `${this.baseUrl}/documents/${encodeURIComponent(documentId)}`;
  }

  private async request(method: "GET" | "POST", url: string, body?: unknown): Promise<unknown> {
    const token = await this.tokenProvider.getAccessToken();
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    this.logger.debug("Docs API request", { method, url });
    const response = await fetch(url, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await response.text();

    if (!response.ok) {
      this.logger.debug("Docs API error", { method, url, status: response.status });
      throw toApiError(response.status, text);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new DocEditError("REMOTE_OPERATION_FAILED", "Docs API returned a non-JSON response", {
        cause: error,
        context: { url, status: response.status },
      });
    }
  }
}

function toApiError(status: number, body: string): Error {
  const message = extractErrorMessage(body);
  if (status === 401) {
    return new DocEditError("AUTHENTICATION_FAILED", `Docs API rejected the credentials: ${message}`, {
      hint: "Run `gdoc-cli logout` and sign in again.",
      context: { status },
    });
  }
  return new DocsApiError(status, `Docs API ${status}: ${message}`, body);
}

function extractErrorMessage(body: string): string {
  const fallback = body.trim() || "no response body";
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return fallback;
  }
  const parsed = ErrorResponseSchema.safeParse(raw);
  return parsed.success ? parsed.data.error.message : fallback;
}
