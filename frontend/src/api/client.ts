import type {
  ExportedFile,
  ExtractResponse,
  LanguagesResponse,
  OutputFormat,
  TranslateOptions,
  TranslateResponse
} from './types';

export class ApiError extends Error {
  readonly status: number;
  readonly code?: string;

  constructor(message: string, status: number, code?: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
  }
}

interface ErrorBody {
  error: string;
  code?: string;
}

function isErrorBody(body: unknown): body is ErrorBody {
  return (
    typeof body === 'object' &&
    body !== null &&
    'error' in body &&
    typeof body.error === 'string' &&
    (!('code' in body) || typeof body.code === 'string')
  );
}

function isJson(response: Response): boolean {
  return response.headers.get('content-type')?.includes('application/json') ?? false;
}

// Le serveur renvoie { success: false, error, code } pour toute erreur
async function toApiError(response: Response): Promise<ApiError> {
  if (isJson(response)) {
    const body: unknown = await response.json();
    if (isErrorBody(body)) {
      return new ApiError(body.error, response.status, body.code);
    }
  }
  return new ApiError(`Erreur HTTP ${response.status}`, response.status);
}

async function request<T>(url: string, init?: RequestInit): Promise<T> {
  const response = await fetch(url, init);
  if (!response.ok) {
    throw await toApiError(response);
  }
  return response.json();
}

export function fetchLanguages(): Promise<LanguagesResponse> {
  return request<LanguagesResponse>('/api/languages');
}

export function extractPdf(file: File): Promise<ExtractResponse> {
  const formData = new FormData();
  formData.append('file', file);
  return request<ExtractResponse>('/api/extract', { method: 'POST', body: formData });
}

export function translatePdf(file: File, options: TranslateOptions): Promise<TranslateResponse> {
  const formData = new FormData();
  formData.append('file', file);
  formData.append('sourceLanguage', options.sourceLanguage);
  formData.append('targetLanguage', options.targetLanguage);
  formData.append('mode', options.mode);
  if (options.pages.trim()) {
    formData.append('pages', options.pages.trim());
  }
  return request<TranslateResponse>('/api/translate', { method: 'POST', body: formData });
}

export function fileNameFromDisposition(header: string | null, fallback: string): string {
  const match = header ? /filename="([^"]+)"/.exec(header) : null;
  return match ? match[1] : fallback;
}

export async function exportTranslation(
  text: string,
  format: OutputFormat,
  fileName?: string
): Promise<ExportedFile> {
  const response = await fetch('/api/export', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ text, format, fileName })
  });
  if (!response.ok) {
    throw await toApiError(response);
  }
  return {
    blob: await response.blob(),
    fileName: fileNameFromDisposition(response.headers.get('content-disposition'), `translation.${format}`)
  };
}

export function saveBlob({ blob, fileName }: ExportedFile): void {
  const url = URL.createObjectURL(blob);
  const link = document.createElement('a');
  link.href = url;
  link.download = fileName;
  document.body.appendChild(link);
  link.click();
  link.remove();
  URL.revokeObjectURL(url);
}

export function errorText(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
