export type RemovalStatus = 'idle' | 'processing' | 'complete' | 'error';

export interface ImageItem {
  id: string;
  name: string;
  file: File;
  size: number;
  previewUrl: string;
  status: RemovalStatus;
  resultUrl?: string;
  resultSize?: number;
  errorMessage?: string;
}
