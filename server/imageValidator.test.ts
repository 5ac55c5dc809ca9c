import { describe, expect, it } from 'vitest';
import { resolveMediaType, sniffMediaType, validateImage } from './imageValidator';

const PNG_MAGIC = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_MAGIC = Buffer.from([0xff, 0xd8, 0xff, 0xe0]);
const MAX = 10 * 1024 * 1024;

const png = (extra = 16) => Buffer.concat([PNG_MAGIC, Buffer.alloc(extra)]);
const jpeg = (extra = 16) => Buffer.concat([JPEG_MAGIC, Buffer.alloc(extra)]);

describe('validateImage', () => {
  it('rejects an empty payload', () => {
    expect(validateImage(Buffer.alloc(0), 'image/png', { maxFileSize: MAX })).toEqual({
      ok: false,
      reason: 'EmptyPayload',
      message: 'Empty file uploaded'
    });
  });

  it('rejects a payload one byte over the ceiling', () => {
    const result = validateImage(png(MAX - PNG_MAGIC.length + 1), 'image/png', { maxFileSize: MAX });
    expect(result).toEqual({ ok: false, reason: 'TooLarge', message: 'File too large. Maximum size: 10.0MB' });
  });

  it('accepts a payload exactly at the ceiling', () => {
    const result = validateImage(png(MAX - PNG_MAGIC.length), 'image/png', { maxFileSize: MAX });
    expect(result.ok).toBe(true);
  });

  it('rejects types outside the allow-list', () => {
    for (const type of ['text/plain', 'image/gif', 'image/webp', undefined]) {
      const result = validateImage(png(), type, { maxFileSize: MAX });
      expect(result).toMatchObject({ ok: false, reason: 'UnsupportedType' });
    }
  });

  it('rejects text declared as a JPEG', () => {
    const result = validateImage(Buffer.from('just some notes'), 'image/jpeg', {
      maxFileSize: MAX,
      filename: 'notes.jpg'
    });
    expect(result).toEqual({
      ok: false,
      reason: 'Malformed',
      message: 'File content does not match a JPEG or PNG image'
    });
  });

  it('rejects a JPEG declared as a PNG', () => {
    expect(validateImage(jpeg(), 'image/png', { maxFileSize: MAX })).toMatchObject({ ok: false, reason: 'Malformed' });
  });

  it('accepts a matching PNG and reports its size', () => {
    const buffer = png(100);
    const result = validateImage(buffer, 'image/png', { maxFileSize: MAX, filename: 'cat.png' });
    expect(result).toEqual({
      ok: true,
      image: { buffer, mediaType: 'image/png', filename: 'cat.png', size: 108 }
    });
  });

  it('treats image/jpg as image/jpeg', () => {
    const result = validateImage(jpeg(), 'image/jpg', { maxFileSize: MAX });
    expect(result.ok && result.image.mediaType).toBe('image/jpeg');
  });

  it('falls back to the extension for generic content types', () => {
    const result = validateImage(png(), 'application/octet-stream', { maxFileSize: MAX, filename: 'Photo.PNG' });
    expect(result.ok && result.image.mediaType).toBe('image/png');
  });
});

describe('resolveMediaType', () => {
  it('ignores parameters and case', () => {
    expect(resolveMediaType('Image/PNG; charset=binary')).toBe('image/png');
  });

  it('returns null for a generic type without a usable extension', () => {
    expect(resolveMediaType('application/octet-stream', 'upload')).toBeNull();
    expect(resolveMediaType('', 'archive.zip')).toBeNull();
  });
});

describe('sniffMediaType', () => {
  it('recognises both signatures', () => {
    expect(sniffMediaType(png())).toBe('image/png');
    expect(sniffMediaType(jpeg())).toBe('image/jpeg');
  });

  it('returns null for short or unknown input', () => {
    expect(sniffMediaType(Buffer.from([0xff, 0xd8]))).toBeNull();
    expect(sniffMediaType(Buffer.from('GIF89a'))).toBeNull();
  });
});
