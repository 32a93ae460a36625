/**
 * INPUT: raw request body fields
 * OUTPUT: validated question text / decoded image, or an error message
 * POS: utility module, boundary validation before anything reaches a paid resource
 */

import { ImageInput, ImageMediaType } from '../models/assistant';

export type Validation<T> = { valid: true; value: T } | { valid: false; error: string };

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024;

/**
 * question: required, non-blank string, trimmed.
 * No length cap here: the provider enforces its own limits and reports a ServiceError.
 */
export function parseQuestion(value: unknown): Validation<string> {
  if (typeof value !== 'string' || !value.trim()) {
    return { valid: false, error: 'question must be a non-empty string' };
  }
  return { valid: true, value: value.trim() };
}

const DATA_URL_PATTERN = /^data:(image\/[a-z+.-]+);base64,/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const SUPPORTED_TYPES: Record<string, ImageMediaType> = {
  'image/png': 'image/png',
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/gif': 'image/gif',
  'image/webp': 'image/webp',
};

/** Media type from the file signature */
export function sniffImageType(data: Buffer): ImageMediaType | null {
  if (data.length >= 8 && data.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) {
    return 'image/png';
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (data.length >= 6) {
    const head = data.subarray(0, 6).toString('ascii');
    if (head === 'GIF87a' || head === 'GIF89a') return 'image/gif';
  }
  if (
    data.length >= 12 &&
    data.subarray(0, 4).toString('ascii') === 'RIFF' &&
    data.subarray(8, 12).toString('ascii') === 'WEBP'
  ) {
    return 'image/webp';
  }
  return null;
}

/**
 * imageBase64: data URL ("data:image/png;base64,...") or bare base64.
 * The declared type, when present, must be supported and agree with the file signature.
 */
export function parseImageBase64(value: unknown): Validation<ImageInput> {
  if (typeof value !== 'string' || !value.trim()) {
    return { valid: false, error: 'imageBase64 must be a non-empty string' };
  }

  const trimmed = value.trim();
  const prefix = trimmed.match(DATA_URL_PATTERN);
  let declared: ImageMediaType | null = null;
  if (prefix) {
    declared = SUPPORTED_TYPES[prefix[1].toLowerCase()] ?? null;
    if (!declared) {
      return { valid: false, error: `unsupported image type ${prefix[1]} (use PNG, JPEG, GIF or WebP)` };
    }
  }

  const payload = (prefix ? trimmed.slice(prefix[0].length) : trimmed).replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(payload)) {
    return { valid: false, error: 'imageBase64 is not valid base64' };
  }

  const data = Buffer.from(payload, 'base64');
  if (data.length > MAX_IMAGE_BYTES) {
    return { valid: false, error: `image must be at most ${MAX_IMAGE_BYTES / (1024 * 1024)} MB` };
  }

  const sniffed = sniffImageType(data);
  if (!sniffed) {
    return { valid: false, error: 'unsupported or unrecognized image (use PNG, JPEG, GIF or WebP)' };
  }
  if (declared && declared !== sniffed) {
    return { valid: false, error: `image content is ${sniffed}, not ${declared}` };
  }

  return { valid: true, value: { data, mediaType: sniffed } };
}
