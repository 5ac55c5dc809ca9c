import { useCallback, useRef, useState } from 'react';
import { ACCEPTED_TYPES } from '@/lib/api';

type Props = {
  onFilesSelected: (files: File[]) => void;
  onFilesRejected?: (names: string[]) => void;
};

const dragActive = (event: React.DragEvent<HTMLDivElement>) => {
  event.preventDefault();
  event.stopPropagation();
};

export function ImageUploader({ onFilesSelected, onFilesRejected }: Props) {
  const inputRef = useRef<HTMLInputElement>(null);
  const [isDragging, setIsDragging] = useState(false);

  const handleFiles = useCallback(
    (fileList: FileList | null) => {
      if (!fileList || fileList.length === 0) {
        return;
      }
      const all = Array.from(fileList);
      const files = all.filter((file) => ACCEPTED_TYPES.includes(file.type));
      const rejected = all.filter((file) => !files.includes(file)).map((file) => file.name);
      if (rejected.length) {
        onFilesRejected?.(rejected);
      }
      if (files.length) {
        onFilesSelected(files);
      }
    },
    [onFilesSelected, onFilesRejected]
  );

  const handleDrop = (event: React.DragEvent<HTMLDivElement>) => {
    dragActive(event);
    setIsDragging(false);
    handleFiles(event.dataTransfer.files);
  };

  return (
    <div
      onDragEnter={(event) => {
        dragActive(event);
        setIsDragging(true);
      }}
      onDragLeave={(event) => {
        dragActive(event);
        setIsDragging(false);
      }}
      onDragOver={dragActive}
      onDrop={handleDrop}
      className={`uploader ${isDragging ? 'uploader--dragging' : ''}`}
    >
      <input
        ref={inputRef}
        type="file"
        accept={ACCEPTED_TYPES.join(',')}
        multiple
        style={{ display: 'none' }}
        onChange={(event) => {
          handleFiles(event.target.files);
          event.target.value = '';
        }}
      />
      <p>Drop JPEG or PNG images here, or</p>
      <div className="uploader__actions">
        <button type="button" onClick={() => inputRef.current?.click()}>
          Choose files
        </button>
      </div>
      <small>Up to 10 MB per image</small>
    </div>
  );
}
