/**
 * MIME Type Detection Utility
 *
 * Detects MIME types from magic bytes of base64-encoded payloads.
 */

import { decodeLeadingBytes } from './runtime/base64.js';

/**
 * Detects MIME type from raw bytes.
 *
 * @returns Detected MIME type, or undefined when the signature is not recognised
 */
export function detectMimeTypeFromBytes(bytes: Uint8Array): string | undefined {
  if (bytes.length < 4) {
    return undefined;
  }

  // PDF: %PDF
  if (bytes[0] === 0x25 && bytes[1] === 0x50 && bytes[2] === 0x44 && bytes[3] === 0x46) {
    return 'application/pdf';
  }

  // JPEG: FF D8 FF
  if (bytes[0] === 0xFF && bytes[1] === 0xD8 && bytes[2] === 0xFF) {
    return 'image/jpeg';
  }

  // PNG: 89 50 4E 47
  if (bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4E && bytes[3] === 0x47) {
    return 'image/png';
  }

  // GIF8
  if (bytes[0] === 0x47 && bytes[1] === 0x49 && bytes[2] === 0x46 && bytes[3] === 0x38) {
    return 'image/gif';
  }

  // WebP: RIFF .... WEBP
  if (bytes.length >= 12 &&
      bytes[0] === 0x52 && bytes[1] === 0x49 && bytes[2] === 0x46 && bytes[3] === 0x46 &&
      bytes[8] === 0x57 && bytes[9] === 0x45 && bytes[10] === 0x42 && bytes[11] === 0x50) {
    return 'image/webp';
  }

  // TIFF: II*\0 or MM\0*
  if ((bytes[0] === 0x49 && bytes[1] === 0x49 && bytes[2] === 0x2A && bytes[3] === 0x00) ||
      (bytes[0] === 0x4D && bytes[1] === 0x4D && bytes[2] === 0x00 && bytes[3] === 0x2A)) {
    return 'image/tiff';
  }

  // RTF: {\rtf
  if (bytes.length >= 5 &&
      bytes[0] === 0x7B && bytes[1] === 0x5C && bytes[2] === 0x72 && bytes[3] === 0x74 && bytes[4] === 0x66) {
    return 'application/rtf';
  }

  // ZIP container (DOCX, XLSX, PPTX, EPUB...). The exact type needs the archive contents.
  if (bytes[0] === 0x50 && bytes[1] === 0x4B && bytes[2] === 0x03 && bytes[3] === 0x04) {
    return 'application/zip';
  }

  return undefined;
}

/**
 * Detects MIME type from a base64 payload (data URI prefix allowed).
 */
export function detectMimeTypeFromBase64(base64Data: string): string | undefined {
  return detectMimeTypeFromBytes(decodeLeadingBytes(base64Data, 16));
}

const EXTENSIONS: Record<string, string> = {
  'application/pdf': 'pdf',
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/gif': 'gif',
  'image/webp': 'webp',
  'image/tiff': 'tiff',
  'application/rtf': 'rtf',
  'application/zip': 'zip',
};

/**
 * File extension (without dot) for a detected MIME type
 */
export function extensionForMimeType(mimeType: string): string | undefined {
  return EXTENSIONS[mimeType];
}
