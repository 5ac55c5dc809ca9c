import { create } from 'zustand';
import type { ImageItem, RemovalStatus } from '@/types/images';

type ImageStore = {
  images: ImageItem[];
  addImages: (files: File[]) => void;
  updateStatus: (id: string, status: RemovalStatus, payload?: Partial<ImageItem>) => void;
  /** Stores a finished cut-out; dropped if the item was discarded meanwhile. */
  completeRemoval: (id: string, result: Blob) => void;
  removeImage: (id: string) => void;
  reset: () => void;
};

const toImageItem = (file: File): ImageItem => ({
  id: crypto.randomUUID(),
  name: file.name,
  file,
  size: file.size,
  previewUrl: URL.createObjectURL(file),
  status: 'idle'
});

const revokeUrls = (image: ImageItem) => {
  URL.revokeObjectURL(image.previewUrl);
  if (image.resultUrl) {
    URL.revokeObjectURL(image.resultUrl);
  }
};

export const useImageStore = create<ImageStore>((set) => ({
  images: [],
  addImages: (files) =>
    set((state) => ({
      images: [
        ...state.images,
        ...files.map((file) => toImageItem(file))
      ]
    })),
  updateStatus: (id, status, payload) =>
    set((state) => ({
      images: state.images.map((image) => {
        if (image.id !== id) {
          return image;
        }
        if (payload && 'resultUrl' in payload && image.resultUrl && image.resultUrl !== payload.resultUrl) {
          URL.revokeObjectURL(image.resultUrl);
        }
        return {
          ...image,
          status,
          ...payload
        };
      })
    })),
  completeRemoval: (id, result) =>
    set((state) => {
      const target = state.images.find((image) => image.id === id);
      if (!target) {
        return state;
      }
      if (target.resultUrl) {
        URL.revokeObjectURL(target.resultUrl);
      }
      const completed: ImageItem = {
        ...target,
        status: 'complete',
        resultUrl: URL.createObjectURL(result),
        resultSize: result.size,
        errorMessage: undefined
      };
      return { images: state.images.map((image) => (image.id === id ? completed : image)) };
    }),
  removeImage: (id) =>
    set((state) => {
      const target = state.images.find((image) => image.id === id);
      if (target) {
        revokeUrls(target);
      }
      return { images: state.images.filter((image) => image.id !== id) };
    }),
  reset: () =>
    set((state) => {
      state.images.forEach(revokeUrls);
      return { images: [] };
    })
}));
