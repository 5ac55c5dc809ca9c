import type { ImageItem } from '@/types/images';
import { Modal } from './Modal';

interface Props {
  image: ImageItem;
  onClose: () => void;
}

export function ComparisonModal({ image, onClose }: Props) {
  return (
    <Modal title={image.name} onClose={onClose}>
      <div className="comparison">
        <figure>
          <img src={image.previewUrl} alt={`Original ${image.name}`} />
          <figcaption>Original · {(image.size / 1024).toFixed(1)} KB</figcaption>
        </figure>
        <figure className="comparison__result">
          {image.resultUrl ? (
            <img src={image.resultUrl} alt={`${image.name} without background`} />
          ) : (
            <p>No result yet.</p>
          )}
          <figcaption>
            Background removed
            {image.resultSize !== undefined && ` · ${(image.resultSize / 1024).toFixed(1)} KB`}
          </figcaption>
        </figure>
      </div>
    </Modal>
  );
}
