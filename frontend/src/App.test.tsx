// @vitest-environment jsdom
import { cleanup, fireEvent, render, screen, within } from '@testing-library/react';
import { afterEach, describe, expect, it, vi } from 'vitest';
import App from './App';

const GREETING = 'مرحبا';

const LANGUAGES = {
  languages: [
    { code: 'ar', name: 'Arabic', rtl: true },
    { code: 'en', name: 'English', rtl: false },
    { code: 'it', name: 'Italian', rtl: false }
  ],
  defaults: { source: 'ar', target: 'it' },
  modes: ['combined', 'per-page'],
  model: 'gemini-2.0-flash',
  maxUploadMb: 10,
  translationAvailable: true
};

const EXTRACTION = {
  success: true,
  fileName: 'saluto.pdf',
  text: GREETING,
  pages: [{ pageNumber: 1, text: GREETING }],
  info: { pageCount: 1, fileSizeKb: 0.9, metadata: {} }
};

const TRANSLATION = {
  success: true,
  fileName: 'saluto.pdf',
  downloadName: 'saluto_translated_20240131_090507.txt',
  result: {
    sourceLanguage: { code: 'ar', name: 'Arabic', rtl: true },
    targetLanguage: { code: 'it', name: 'Italian', rtl: false },
    mode: 'combined',
    model: 'gemini-2.0-flash',
    sections: [{ pageNumbers: [1], originalText: GREETING, translatedText: 'Ciao' }],
    translatedText: 'Ciao'
  }
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json; charset=utf-8' }
  });
}

function stubServer(translate: () => Response = () => jsonResponse(TRANSLATION)) {
  const fetchMock = vi.fn(async (url: string, _init?: RequestInit) => {
    switch (url) {
      case '/api/languages':
        return jsonResponse(LANGUAGES);
      case '/api/extract':
        return jsonResponse(EXTRACTION);
      case '/api/translate':
        return translate();
      default:
        return jsonResponse({ success: false, error: 'Not found', code: 'not_found' }, 404);
    }
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

async function uploadGreeting() {
  render(<App />);
  await within(screen.getByLabelText('Langue source')).findByRole('option', { name: 'English' });
  fireEvent.change(screen.getByLabelText('Fichier PDF'), {
    target: { files: [new File(['%PDF-1.4'], 'saluto.pdf', { type: 'application/pdf' })] }
  });
  await screen.findByText(GREETING);
}

afterEach(() => {
  cleanup();
  vi.unstubAllGlobals();
});

describe('App', () => {
  it('uses Arabic to Italian by default', async () => {
    stubServer();
    render(<App />);
    await within(screen.getByLabelText('Langue source')).findByRole('option', { name: 'English' });

    expect(screen.getByLabelText<HTMLSelectElement>('Langue source').value).toBe('ar');
    expect(screen.getByLabelText<HTMLSelectElement>('Langue cible').value).toBe('it');
  });

  it('shows the extracted text and document information after upload', async () => {
    stubServer();
    await uploadGreeting();

    expect(screen.getByText('1 page(s) · 0.9 Ko')).toBeTruthy();
    expect(screen.getByText('saluto.pdf')).toBeTruthy();
  });

  it('displays the Italian translation of an uploaded PDF', async () => {
    const fetchMock = stubServer();
    await uploadGreeting();

    fireEvent.click(screen.getByRole('button', { name: 'Traduire' }));

    expect((await screen.findByTestId('translated-text')).textContent).toBe('Ciao');
    const translateCall = fetchMock.mock.calls.find(([url]) => url === '/api/translate');
    const body = translateCall?.[1]?.body;
    expect(body instanceof FormData && body.get('sourceLanguage')).toBe('ar');
    expect(body instanceof FormData && body.get('targetLanguage')).toBe('it');
    expect(screen.getByRole('button', { name: 'Télécharger .pdf' })).toBeTruthy();
  });

  it('shows the server error when translation fails', async () => {
    stubServer(() =>
      jsonResponse(
        {
          success: false,
          error: 'GOOGLE_API_KEY is not set. Add your Gemini API key to the environment and restart the server.',
          code: 'authentication_error'
        },
        401
      )
    );
    await uploadGreeting();

    fireEvent.click(screen.getByRole('button', { name: 'Traduire' }));

    const alert = await screen.findByRole('alert');
    expect(alert.firstChild?.textContent).toBe(
      'GOOGLE_API_KEY is not set. Add your Gemini API key to the environment and restart the server.'
    );
    expect(screen.queryByTestId('translated-text')).toBeNull();
  });

  it('blocks translation when both languages are equal', async () => {
    stubServer();
    await uploadGreeting();

    fireEvent.change(screen.getByLabelText('Langue cible'), { target: { value: 'ar' } });

    expect(screen.getByText('Les langues source et cible doivent être différentes')).toBeTruthy();
    expect(screen.getByRole<HTMLButtonElement>('button', { name: 'Traduire' }).disabled).toBe(true);
  });
});
