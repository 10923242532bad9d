import type { FC } from 'react';
import { ArrowDownTrayIcon } from '@heroicons/react/24/outline';
import type { OutputFormat, TranslationResult as Result } from '../api/types';

interface TranslationResultProps {
  result: Result;
  downloading: boolean;
  onDownload: (format: OutputFormat) => void;
}

const DOWNLOADS: { format: OutputFormat; label: string }[] = [
  { format: 'txt', label: 'Télécharger .txt' },
  { format: 'pdf', label: 'Télécharger .pdf' }
];

const TranslationResult: FC<TranslationResultProps> = ({ result, downloading, onDownload }) => {
  const { sourceLanguage, targetLanguage } = result;
  const pageNumbers = result.sections.flatMap((section) => section.pageNumbers);

  return (
    <section className="translation-panel" aria-label="Résultat de la traduction">
      <h2 className="panel-title">
        Traduction ({sourceLanguage.name} → {targetLanguage.name})
      </h2>
      <p className="translation-meta">
        {pageNumbers.length} page(s) · modèle {result.model}
      </p>

      <div className="translation-content target" dir={targetLanguage.rtl ? 'rtl' : 'ltr'}>
        <pre data-testid="translated-text">{result.translatedText}</pre>
      </div>

      <div className="download-buttons">
        {DOWNLOADS.map(({ format, label }) => (
          <button
            key={format}
            className="control-button"
            onClick={() => onDownload(format)}
            disabled={downloading}
          >
            <ArrowDownTrayIcon className="icon" aria-hidden="true" />
            {label}
          </button>
        ))}
      </div>
    </section>
  );
};

export default TranslationResult;
