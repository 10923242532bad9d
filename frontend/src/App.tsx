import { useCallback, useEffect, useState } from 'react';
import {
  DocumentArrowUpIcon,
  DocumentTextIcon,
  LanguageIcon,
  ArrowsRightLeftIcon
} from '@heroicons/react/24/outline';
import {
  errorText,
  exportTranslation,
  extractPdf,
  fetchLanguages,
  saveBlob,
  translatePdf
} from './api/client';
import type {
  ExtractResponse,
  Language,
  OutputFormat,
  TranslateResponse,
  TranslationMode
} from './api/types';
import TranslationResult from './components/TranslationResult';
import UploadArea from './components/UploadArea';
import './App.css';

const TRANSLATION_MODES: { value: TranslationMode; label: string }[] = [
  { value: 'combined', label: 'Document entier' },
  { value: 'per-page', label: 'Page par page' }
];

function isTranslationMode(value: string): value is TranslationMode {
  return TRANSLATION_MODES.some((mode) => mode.value === value);
}

export default function App() {
  const [languages, setLanguages] = useState<Language[]>([]);
  const [languagesError, setLanguagesError] = useState<string | null>(null);
  const [translationAvailable, setTranslationAvailable] = useState(true);
  const [sourceLanguage, setSourceLanguage] = useState('ar');
  const [targetLanguage, setTargetLanguage] = useState('it');
  const [translationMode, setTranslationMode] = useState<TranslationMode>('combined');
  const [pageSelection, setPageSelection] = useState('');

  const [selectedFile, setSelectedFile] = useState<File | null>(null);
  const [extraction, setExtraction] = useState<ExtractResponse | null>(null);
  const [extracting, setExtracting] = useState(false);
  const [translating, setTranslating] = useState(false);
  const [translation, setTranslation] = useState<TranslateResponse | null>(null);
  const [downloading, setDownloading] = useState(false);
  const [error, setError] = useState<string | null>(null);

  const loadLanguages = useCallback(async () => {
    try {
      const data = await fetchLanguages();
      setLanguages(data.languages);
      setSourceLanguage(data.defaults.source);
      setTargetLanguage(data.defaults.target);
      setTranslationAvailable(data.translationAvailable);
      setLanguagesError(null);
    } catch (err) {
      console.error('Erreur lors du chargement des langues:', err);
      setLanguagesError('Impossible de charger les langues. Veuillez réessayer plus tard.');
    }
  }, []);

  useEffect(() => {
    void loadLanguages();
  }, [loadLanguages]);

  const handleUpload = async (file: File) => {
    setSelectedFile(file);
    setExtraction(null);
    setTranslation(null);
    setError(null);
    setExtracting(true);

    try {
      setExtraction(await extractPdf(file));
    } catch (err) {
      console.error('Erreur lors de la lecture du fichier:', err);
      setError(errorText(err, 'Erreur lors de la lecture du fichier'));
    } finally {
      setExtracting(false);
    }
  };

  const sameLanguages = sourceLanguage === targetLanguage;

  const handleTranslate = async () => {
    if (!selectedFile) {
      setError('Veuillez sélectionner un fichier PDF');
      return;
    }
    if (sameLanguages) {
      setError('Les langues source et cible doivent être différentes');
      return;
    }

    setTranslating(true);
    setTranslation(null);
    setError(null);

    try {
      setTranslation(
        await translatePdf(selectedFile, {
          sourceLanguage,
          targetLanguage,
          mode: translationMode,
          pages: pageSelection
        })
      );
    } catch (err) {
      console.error('Erreur de traduction:', err);
      setError(errorText(err, 'Erreur lors de la traduction'));
    } finally {
      setTranslating(false);
    }
  };

  const handleDownload = async (format: OutputFormat) => {
    if (!translation) return;
    setDownloading(true);
    try {
      saveBlob(await exportTranslation(translation.result.translatedText, format, translation.fileName));
    } catch (err) {
      console.error('Erreur lors du téléchargement:', err);
      setError(errorText(err, 'Erreur lors du téléchargement'));
    } finally {
      setDownloading(false);
    }
  };

  const sourceRtl = languages.find((lang) => lang.code === sourceLanguage)?.rtl ?? false;
  const busy = extracting || translating;

  return (
    <div>
      <h1 className="app-title">PDF Translator</h1>

      <div className="app-container">
        <div className="config-panel">
          <h2 className="panel-title">Configuration</h2>

          <div className="control-group">
            <span className="control-label">
              <DocumentArrowUpIcon className="icon" aria-hidden="true" />
              Fichier source
            </span>
            <UploadArea
              onUpload={(file) => void handleUpload(file)}
              onReject={setError}
              loading={extracting}
              fileName={selectedFile?.name}
            />
            {extraction && (
              <span className="selected-file">
                {extraction.info.pageCount} page(s) · {extraction.info.fileSizeKb} Ko
              </span>
            )}
          </div>

          <div className="control-group">
            <label className="control-label" htmlFor="source-language">
              <LanguageIcon className="icon" aria-hidden="true" />
              Langue source
            </label>
            <select
              id="source-language"
              value={sourceLanguage}
              onChange={(e) => setSourceLanguage(e.target.value)}
              className="control-select"
              disabled={busy}
            >
              {languages.map((lang) => (
                <option key={lang.code} value={lang.code}>
                  {lang.name}
                </option>
              ))}
            </select>
          </div>

          <div className="control-group">
            <label className="control-label" htmlFor="target-language">
              <LanguageIcon className="icon" aria-hidden="true" />
              Langue cible
            </label>
            <select
              id="target-language"
              value={targetLanguage}
              onChange={(e) => setTargetLanguage(e.target.value)}
              className="control-select"
              disabled={busy}
            >
              {languages.map((lang) => (
                <option key={lang.code} value={lang.code}>
                  {lang.name}
                </option>
              ))}
            </select>
            {sameLanguages && (
              <span className="warning">Les langues source et cible doivent être différentes</span>
            )}
          </div>

          <div className="control-group">
            <label className="control-label" htmlFor="translation-mode">
              <ArrowsRightLeftIcon className="icon" aria-hidden="true" />
              Mode de traduction
            </label>
            <select
              id="translation-mode"
              value={translationMode}
              onChange={(e) => {
                if (isTranslationMode(e.target.value)) {
                  setTranslationMode(e.target.value);
                }
              }}
              className="control-select"
              disabled={busy}
            >
              {TRANSLATION_MODES.map((mode) => (
                <option key={mode.value} value={mode.value}>
                  {mode.label}
                </option>
              ))}
            </select>
          </div>

          <div className="control-group">
            <label className="control-label" htmlFor="page-selection">
              <DocumentTextIcon className="icon" aria-hidden="true" />
              Pages
            </label>
            <input
              id="page-selection"
              className="control-input"
              placeholder="Toutes (ex. 1,3-4)"
              value={pageSelection}
              onChange={(e) => setPageSelection(e.target.value)}
              disabled={busy}
            />
          </div>

          {!translationAvailable && (
            <p className="warning">
              GOOGLE_API_KEY n'est pas configurée sur le serveur : la traduction est indisponible.
            </p>
          )}

          <button
            onClick={() => void handleTranslate()}
            disabled={!selectedFile || busy || sameLanguages}
            className="control-button translate-button"
          >
            {translating ? 'Traduction en cours...' : 'Traduire'}
          </button>
          {translating && <div className="spinner" role="status" aria-label="Traduction en cours" />}
        </div>

        <div className="translation-panel">
          {extraction && (
            <details className="translation-box">
              <summary className="translation-box-title">Texte extrait</summary>
              <div className="translation-content source" dir={sourceRtl ? 'rtl' : 'ltr'}>
                <pre>{extraction.text}</pre>
              </div>
            </details>
          )}

          {translation && (
            <TranslationResult
              result={translation.result}
              downloading={downloading}
              onDownload={(format) => void handleDownload(format)}
            />
          )}
        </div>

        {(languagesError || error) && (
          <div className="error-message" role="alert">
            {languagesError || error}
            <button
              onClick={() => {
                setError(null);
                if (languagesError) void loadLanguages();
              }}
            >
              {languagesError ? 'Réessayer' : '×'}
            </button>
          </div>
        )}
      </div>
    </div>
  );
}
