import { useRef, type ChangeEvent, type DragEvent, type FC } from 'react';
import { CloudArrowUpIcon } from '@heroicons/react/24/outline';

interface UploadAreaProps {
  onUpload: (file: File) => void;
  onReject: (message: string) => void;
  loading: boolean;
  fileName?: string;
}

export function isPdfFile(file: File): boolean {
  return file.type === 'application/pdf' || file.name.toLowerCase().endsWith('.pdf');
}

const UploadArea: FC<UploadAreaProps> = ({ onUpload, onReject, loading, fileName }) => {
  const inputRef = useRef<HTMLInputElement>(null);

  const accept = (files: ArrayLike<File> | null) => {
    const file = files?.[0];
    if (!file) return;
    if (!isPdfFile(file)) {
      onReject(`Format de fichier non supporté (${file.name}). Seuls les fichiers PDF sont acceptés.`);
      return;
    }
    onUpload(file);
  };

  const handleDrop = (e: DragEvent<HTMLDivElement>) => {
    e.preventDefault();
    if (!loading) {
      accept(e.dataTransfer.files);
    }
  };

  const handleDragOver = (e: DragEvent<HTMLDivElement>) => {
    e.preventDefault();
  };

  const handleFileInput = (e: ChangeEvent<HTMLInputElement>) => {
    accept(e.target.files);
    // Permet de re-sélectionner le même fichier
    e.target.value = '';
  };

  return (
    <div
      className="upload-area"
      onDrop={handleDrop}
      onDragOver={handleDragOver}
      onClick={() => inputRef.current?.click()}
    >
      <input
        ref={inputRef}
        type="file"
        className="hidden"
        aria-label="Fichier PDF"
        onChange={handleFileInput}
        accept=".pdf,application/pdf"
        disabled={loading}
      />
      <CloudArrowUpIcon className="upload-icon" />
      <span className="upload-hint">
        {loading
          ? 'Lecture du document...'
          : fileName ?? 'Glissez-déposez un fichier PDF ou cliquez pour sélectionner'}
      </span>
    </div>
  );
};

export default UploadArea;
