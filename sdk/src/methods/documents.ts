import { ContextChatValidationError } from '../errors.js';
import { ContextChatHttpClient } from '../http.js';
import type {
  DocumentDetail,
  DocumentSummary,
  IngestInput,
  IngestResult,
  ListDocumentsResult,
  PageInput,
  PageMeta,
} from '../types.js';

interface IngestResponseEnvelope {
  data: IngestResult;
}

interface ListDocumentsResponseEnvelope {
  data: DocumentSummary[];
  meta: PageMeta;
}

interface DocumentResponseEnvelope {
  data: DocumentDetail;
}

export async function ingestMethod(
  http: ContextChatHttpClient,
  input: IngestInput,
): Promise<IngestResult> {
  if (!input.name || input.name.trim().length === 0) {
    throw new ContextChatValidationError('ingest.name is required', {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }

  const response = await http.request<IngestResponseEnvelope>({
    method: 'POST',
    path: '/v1/documents',
    body: { name: input.name, text: input.text },
  });

  return {
    documentId: response.data.documentId,
    chunksAdded: response.data.chunksAdded,
  };
}

export async function listDocumentsMethod(
  http: ContextChatHttpClient,
  input: PageInput = {},
): Promise<ListDocumentsResult> {
  const response = await http.request<ListDocumentsResponseEnvelope>({
    method: 'GET',
    path: '/v1/documents',
    query: { limit: input.limit, offset: input.offset },
  });

  return { documents: response.data, meta: response.meta };
}

export async function getDocumentMethod(
  http: ContextChatHttpClient,
  documentId: string,
): Promise<DocumentDetail> {
  const response = await http.request<DocumentResponseEnvelope>({
    method: 'GET',
    path: `/v1/documents/${encodeURIComponent(requireId(documentId, 'documentId'))}`,
  });
  return response.data;
}

export async function deleteDocumentMethod(
  http: ContextChatHttpClient,
  documentId: string,
): Promise<void> {
  await http.request<{ data: { deleted: boolean } }>({
    method: 'DELETE',
    path: `/v1/documents/${encodeURIComponent(requireId(documentId, 'documentId'))}`,
  });
}

export function requireId(value: string, field: string): string {
  const id = value.trim();
  if (!id) {
    throw new ContextChatValidationError(`${field} must not be empty`, {
      status: 400,
      code: 'INVALID_ARGS',
    });
  }
  return id;
}
