import type { RejectionReason } from './errors';

export const SUPPORTED_MEDIA_TYPES = ['image/jpeg', 'image/png'] as const;
export type SupportedMediaType = (typeof SUPPORTED_MEDIA_TYPES)[number];

const MEDIA_TYPE_ALIASES: Record<string, SupportedMediaType> = {
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
  'image/png': 'image/png',
  'image/x-png': 'image/png'
};

const EXTENSION_TYPES: Record<string, SupportedMediaType> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png'
};

// Types browsers and CLI tools send when they do not know better.
const GENERIC_TYPES = new Set(['', 'application/octet-stream', 'binary/octet-stream']);

const SIGNATURES: Record<SupportedMediaType, number[]> = {
  'image/jpeg': [0xff, 0xd8, 0xff],
  'image/png': [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]
};

export interface ValidatedImage {
  buffer: Buffer;
  mediaType: SupportedMediaType;
  filename?: string;
  size: number;
}

export type ValidationResult =
  | { ok: true; image: ValidatedImage }
  | { ok: false; reason: RejectionReason; message: string };

export interface ValidateImageOptions {
  maxFileSize: number;
  filename?: string;
}

export const formatMegabytes = (bytes: number) => `${(bytes / (1024 * 1024)).toFixed(1)}MB`;

const extensionOf = (filename?: string) => {
  if (!filename) {
    return undefined;
  }
  const dot = filename.lastIndexOf('.');
  return dot >= 0 ? filename.slice(dot + 1).toLowerCase() : undefined;
};

export const resolveMediaType = (declared: string | undefined, filename?: string): SupportedMediaType | null => {
  const normalized = (declared ?? '').split(';')[0].trim().toLowerCase();
  if (GENERIC_TYPES.has(normalized)) {
    const ext = extensionOf(filename);
    return ext ? EXTENSION_TYPES[ext] ?? null : null;
  }
  return MEDIA_TYPE_ALIASES[normalized] ?? null;
};

export const sniffMediaType = (bytes: Uint8Array): SupportedMediaType | null => {
  for (const mediaType of SUPPORTED_MEDIA_TYPES) {
    const signature = SIGNATURES[mediaType];
    if (bytes.length >= signature.length && signature.every((byte, index) => bytes[index] === byte)) {
      return mediaType;
    }
  }
  return null;
};

export const validateImage = (
  buffer: Buffer,
  declaredType: string | undefined,
  { maxFileSize, filename }: ValidateImageOptions
): ValidationResult => {
  if (buffer.length === 0) {
    return { ok: false, reason: 'EmptyPayload', message: 'Empty file uploaded' };
  }
  if (buffer.length > maxFileSize) {
    return {
      ok: false,
      reason: 'TooLarge',
      message: `File too large. Maximum size: ${formatMegabytes(maxFileSize)}`
    };
  }

  const mediaType = resolveMediaType(declaredType, filename);
  if (!mediaType) {
    return { ok: false, reason: 'UnsupportedType', message: 'Invalid file type. Supported formats: JPEG, PNG' };
  }

  if (sniffMediaType(buffer) !== mediaType) {
    return { ok: false, reason: 'Malformed', message: 'File content does not match a JPEG or PNG image' };
  }

  return {
    ok: true,
    image: { buffer, mediaType, filename, size: buffer.length }
  };
};
