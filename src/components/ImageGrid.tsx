import type { ImageItem } from '@/types/images';

interface Props {
  images: ImageItem[];
  canProcess: boolean;
  onRemoveBackground: (image: ImageItem) => void;
  onCompare: (image: ImageItem) => void;
  onDiscard: (image: ImageItem) => void;
}

const statusCopy: Record<ImageItem['status'], string> = {
  idle: 'Waiting',
  processing: 'Removing background…',
  complete: 'Done',
  error: 'Failed'
};

export const resultName = (name: string) => {
  const dot = name.lastIndexOf('.');
  return `nobg_${dot > 0 ? name.slice(0, dot) : name}.png`;
};

export function ImageGrid({ images, canProcess, onRemoveBackground, onCompare, onDiscard }: Props) {
  if (images.length === 0) {
    return <p>No images yet.</p>;
  }

  return (
    <div className="image-grid">
      {images.map((image) => (
        <article key={image.id} className="image-card">
          <div className="image-card__preview">
            <img src={image.previewUrl} alt={image.name} loading="lazy" />
          </div>
          <strong>{image.name}</strong>
          <small>{(image.size / 1024).toFixed(1)} KB</small>
          <div className="image-card__actions">
            <button
              type="button"
              onClick={() => onRemoveBackground(image)}
              disabled={!canProcess || image.status === 'processing'}
            >
              {image.resultUrl ? 'Run again' : 'Remove background'}
            </button>
            <span className="image-card__status">{statusCopy[image.status]}</span>
          </div>
          {image.resultUrl && (
            <div className="image-card__preview image-card__preview--result">
              <img src={image.resultUrl} alt={`${image.name} without background`} loading="lazy" />
            </div>
          )}
          {image.errorMessage && (
            <small style={{ color: '#dc2626' }}>{image.errorMessage}</small>
          )}
          <div className="image-card__secondary-actions">
            <button type="button" onClick={() => onCompare(image)} disabled={!image.resultUrl}>
              Compare
            </button>
            {image.resultUrl && (
              <a className="button" href={image.resultUrl} download={resultName(image.name)}>
                Download
              </a>
            )}
            <button type="button" onClick={() => onDiscard(image)} disabled={image.status === 'processing'}>
              Discard
            </button>
          </div>
        </article>
      ))}
    </div>
  );
}
