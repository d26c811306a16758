import {
  type BatchResult,
  createRuntimeLogger,
  DocumentEditor,
  type DocumentService,
  type ParsedDocument,
  type RevisionToken,
  type RuntimeLogger,
  type WireRequest,
} from "@gdoc-editor/core";
import { resolveAccessTokenProvider, resolveCredentialSettings } from "../google/auth.js";
import { GoogleDocsService } from "../google/docsClient.js";
import { type CliConfig, ConfigStore } from "./configStore.js";
import {
  ENV,
  resolveLogLevel,
  resolveRuntimeConfigBoolean,
  resolveRuntimeConfigString,
} from "./runtimeOptions.js";

export type ServiceFactory = (config: CliConfig, logger: RuntimeLogger) => Promise<DocumentService>;

/** Collaborators a command needs; tests swap in an in-memory service. */
export interface CliRuntime {
  configStore: ConfigStore;
  createService: ServiceFactory;
  createLogger: (config: CliConfig) => RuntimeLogger;
}

export type EditorSession = {
  config: CliConfig;
  logger: RuntimeLogger;
  editor: DocumentEditor;
};

export const createGoogleDocsService: ServiceFactory = async (config, logger) => {
  const tokenProvider = await resolveAccessTokenProvider(resolveCredentialSettings(config), { logger });
  return new GoogleDocsService({
    tokenProvider,
    baseUrl: resolveRuntimeConfigString(undefined, config.apiBaseUrl, ENV.apiBaseUrl),
    logger,
  });
};

export function createCliLogger(config: CliConfig): RuntimeLogger {
  return createRuntimeLogger({
    level: resolveLogLevel(undefined, config.logLevel),
    pretty: resolveRuntimeConfigBoolean(undefined, config.pretty, ENV.logPretty),
    module: "cli",
  });
}

export function createDefaultRuntime(): CliRuntime {
  return {
    configStore: new ConfigStore(),
    createService: createGoogleDocsService,
    createLogger: createCliLogger,
  };
}

/**
 * Builds the editor without touching credentials; the service is created on
 * the first document call, after the editor has validated the operations.
 */
export async function openEditor(runtime: CliRuntime): Promise<EditorSession> {
  const config = await runtime.configStore.load();
  const logger = runtime.createLogger(config);
  const service = new LazyDocumentService(() => runtime.createService(config, logger));
  return { config, logger, editor: new DocumentEditor(service, { logger }) };
}

class LazyDocumentService implements DocumentService {
  private readonly factory: () => Promise<DocumentService>;
  private service?: Promise<DocumentService>;

  constructor(factory: () => Promise<DocumentService>) {
    this.factory = factory;
  }

  async fetchDocument(documentId: string): Promise<ParsedDocument> {
    return (await this.resolve()).fetchDocument(documentId);
  }

  async fetchRevision(documentId: string): Promise<RevisionToken> {
    return (await this.resolve()).fetchRevision(documentId);
  }

  async submitBatch(
    documentId: string,
    requests: WireRequest[],
    requiredRevision?: RevisionToken
  ): Promise<BatchResult> {
    return (await this.resolve()).submitBatch(documentId, requests, requiredRevision);
  }

  private resolve(): Promise<DocumentService> {
    this.service ??= this.factory();
    return this.service;
  }
}
