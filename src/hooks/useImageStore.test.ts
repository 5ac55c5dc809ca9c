import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { useImageStore } from './useImageStore';

const file = (name: string) => new File([new Uint8Array([0xff, 0xd8, 0xff])], name, { type: 'image/jpeg' });

describe('useImageStore', () => {
  let urls = 0;

  beforeEach(() => {
    urls = 0;
    vi.spyOn(URL, 'createObjectURL').mockImplementation(() => `blob:test/${++urls}`);
    vi.spyOn(URL, 'revokeObjectURL').mockImplementation(() => undefined);
    useImageStore.setState({ images: [] });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('adds files as idle items with preview URLs', () => {
    useImageStore.getState().addImages([file('a.jpg'), file('b.jpg')]);

    const { images } = useImageStore.getState();
    expect(images.map(({ name, status, previewUrl, size }) => ({ name, status, previewUrl, size }))).toEqual([
      { name: 'a.jpg', status: 'idle', previewUrl: 'blob:test/1', size: 3 },
      { name: 'b.jpg', status: 'idle', previewUrl: 'blob:test/2', size: 3 }
    ]);
    expect(new Set(images.map((image) => image.id)).size).toBe(2);
  });

  it('updates one item and revokes a replaced result URL', () => {
    useImageStore.getState().addImages([file('a.jpg'), file('b.jpg')]);
    const [first, second] = useImageStore.getState().images;

    useImageStore.getState().updateStatus(first.id, 'complete', { resultUrl: 'blob:result/1', resultSize: 10 });
    useImageStore.getState().updateStatus(first.id, 'complete', { resultUrl: 'blob:result/2', resultSize: 12 });

    const [updated, untouched] = useImageStore.getState().images;
    expect(updated).toMatchObject({ status: 'complete', resultUrl: 'blob:result/2', resultSize: 12 });
    expect(untouched).toBe(second);
    expect(URL.revokeObjectURL).toHaveBeenCalledWith('blob:result/1');
  });

  it('stores a finished cut-out as an object URL', () => {
    useImageStore.getState().addImages([file('a.jpg')]);
    const [item] = useImageStore.getState().images;

    useImageStore.getState().completeRemoval(item.id, new Blob([new Uint8Array(5)], { type: 'image/png' }));

    expect(useImageStore.getState().images[0]).toMatchObject({
      status: 'complete',
      resultUrl: 'blob:test/2',
      resultSize: 5
    });
  });

  it('drops a result that arrives after the list was cleared', () => {
    useImageStore.getState().addImages([file('a.jpg')]);
    const [item] = useImageStore.getState().images;
    useImageStore.getState().updateStatus(item.id, 'processing');
    useImageStore.getState().reset();

    useImageStore.getState().completeRemoval(item.id, new Blob([new Uint8Array(5)], { type: 'image/png' }));

    expect(useImageStore.getState().images).toEqual([]);
    expect(URL.createObjectURL).toHaveBeenCalledTimes(1);
  });

  it('removes a single item and frees its URLs', () => {
    useImageStore.getState().addImages([file('a.jpg'), file('b.jpg')]);
    const [first] = useImageStore.getState().images;
    useImageStore.getState().updateStatus(first.id, 'complete', { resultUrl: 'blob:result/1' });

    useImageStore.getState().removeImage(first.id);

    expect(useImageStore.getState().images.map((image) => image.name)).toEqual(['b.jpg']);
    expect(URL.revokeObjectURL).toHaveBeenCalledWith('blob:test/1');
    expect(URL.revokeObjectURL).toHaveBeenCalledWith('blob:result/1');
  });

  it('reset empties the list and revokes every preview', () => {
    useImageStore.getState().addImages([file('a.jpg'), file('b.jpg')]);

    useImageStore.getState().reset();

    expect(useImageStore.getState().images).toEqual([]);
    expect(URL.revokeObjectURL).toHaveBeenCalledTimes(2);
  });
});
