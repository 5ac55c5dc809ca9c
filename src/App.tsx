import { useCallback, useMemo, useState } from 'react';
import { ComparisonModal } from './components/ComparisonModal';
import { HealthBadge } from './components/HealthBadge';
import { ImageGrid } from './components/ImageGrid';
import { ImageUploader } from './components/ImageUploader';
import { useImageStore } from './hooks/useImageStore';
import { useServiceHealth } from './hooks/useServiceHealth';
import { removeBackground } from './lib/api';
import type { ImageItem } from './types/images';

function App() {
  const { images, addImages, updateStatus, completeRemoval, removeImage, reset } = useImageStore();
  const health = useServiceHealth();
  const [selectedImageId, setSelectedImageId] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const handleFilesSelected = useCallback(
    (files: File[]) => {
      setNotice(null);
      addImages(files);
    },
    [addImages]
  );

  const handleFilesRejected = useCallback((names: string[]) => {
    setNotice(`Skipped ${names.join(', ')}: only JPEG and PNG are supported.`);
  }, []);

  const handleRemoveBackground = useCallback(
    async (image: ImageItem) => {
      updateStatus(image.id, 'processing', { errorMessage: undefined });
      try {
        const result = await removeBackground(image.file);
        console.log('[removeBackground] completed', { imageId: image.id, bytes: result.size });
        completeRemoval(image.id, result);
      } catch (error) {
        console.error(error);
        const message = error instanceof Error ? error.message : 'Background removal failed';
        updateStatus(image.id, 'error', { errorMessage: message });
      }
    },
    [updateStatus, completeRemoval]
  );

  const handleProcessAll = useCallback(async () => {
    const pending = useImageStore.getState().images.filter((image) => image.status === 'idle' || image.status === 'error');
    for (const image of pending) {
      await handleRemoveBackground(image);
    }
  }, [handleRemoveBackground]);

  const selectedImage = useMemo(
    () => images.find((image) => image.id === selectedImageId),
    [images, selectedImageId]
  );

  const canProcess = health?.modelLoaded === true;
  const isProcessing = images.some((image) => image.status === 'processing');

  return (
    <div className="layout">
      <header style={{ marginBottom: '2rem' }}>
        <h1>Background removal</h1>
        <p>Upload photos and get transparent PNG cut-outs back.</p>
        <HealthBadge health={health} />
        <div style={{ display: 'flex', gap: '0.75rem', flexWrap: 'wrap', marginTop: '1rem' }}>
          <button type="button" onClick={() => void handleProcessAll()} disabled={!canProcess || !images.length}>
            Process all
          </button>
          <button type="button" onClick={reset} disabled={!images.length || isProcessing}>
            Clear list
          </button>
        </div>
      </header>

      <section className="panel" style={{ marginBottom: '2rem' }}>
        <ImageUploader onFilesSelected={handleFilesSelected} onFilesRejected={handleFilesRejected} />
        {notice && <small style={{ color: '#d97706' }}>{notice}</small>}
      </section>

      <section className="panel">
        <ImageGrid
          images={images}
          canProcess={canProcess}
          onRemoveBackground={(image) => void handleRemoveBackground(image)}
          onCompare={(image) => setSelectedImageId(image.id)}
          onDiscard={(image) => removeImage(image.id)}
        />
      </section>

      {selectedImage && <ComparisonModal image={selectedImage} onClose={() => setSelectedImageId(null)} />}
    </div>
  );
}

export default App;
