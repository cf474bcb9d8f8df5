/**
 * Content sniffing for files whose extension is not in the type table.
 */

import { closeSync, openSync, readSync } from 'fs';

const SNIFF_BYTES = 512;

interface Signature {
  mime: string;
  offset: number;
  bytes: number[];
  /** Second marker that must also match, e.g. the RIFF form type. */
  and?: { offset: number; bytes: number[] };
}

const ascii = (value: string): number[] => Array.from(value, char => char.charCodeAt(0));

const SIGNATURES: Signature[] = [
  { mime: 'image/png', offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { mime: 'image/jpeg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
  { mime: 'image/gif', offset: 0, bytes: ascii('GIF8') },
  { mime: 'image/bmp', offset: 0, bytes: ascii('BM') },
  { mime: 'image/tiff', offset: 0, bytes: [0x49, 0x49, 0x2a, 0x00] },
  { mime: 'image/tiff', offset: 0, bytes: [0x4d, 0x4d, 0x00, 0x2a] },
  { mime: 'image/webp', offset: 0, bytes: ascii('RIFF'), and: { offset: 8, bytes: ascii('WEBP') } },
  { mime: 'audio/wav', offset: 0, bytes: ascii('RIFF'), and: { offset: 8, bytes: ascii('WAVE') } },
  { mime: 'video/x-msvideo', offset: 0, bytes: ascii('RIFF'), and: { offset: 8, bytes: ascii('AVI ') } },
  { mime: 'application/pdf', offset: 0, bytes: ascii('%PDF-') },
  { mime: 'application/msword', offset: 0, bytes: [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1] },
  { mime: 'application/zip', offset: 0, bytes: [0x50, 0x4b, 0x03, 0x04] },
  { mime: 'application/gzip', offset: 0, bytes: [0x1f, 0x8b] },
  { mime: 'application/x-rar-compressed', offset: 0, bytes: ascii('Rar!') },
  { mime: 'application/x-7z-compressed', offset: 0, bytes: [0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c] },
  { mime: 'application/x-tar', offset: 257, bytes: ascii('ustar') },
  { mime: 'audio/mpeg', offset: 0, bytes: ascii('ID3') },
  { mime: 'audio/mpeg', offset: 0, bytes: [0xff, 0xfb] },
  { mime: 'audio/ogg', offset: 0, bytes: ascii('OggS') },
  { mime: 'audio/flac', offset: 0, bytes: ascii('fLaC') },
  { mime: 'audio/mp4', offset: 4, bytes: ascii('ftypM4A') },
  { mime: 'video/mp4', offset: 4, bytes: ascii('ftyp') },
  { mime: 'video/x-matroska', offset: 0, bytes: [0x1a, 0x45, 0xdf, 0xa3] },
];

export const DOCUMENT_MIME_TYPES = new Set([
  'application/pdf',
  'application/msword',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
]);

export const ARCHIVE_MIME_TYPES = new Set([
  'application/zip',
  'application/x-rar-compressed',
  'application/x-tar',
  'application/gzip',
  'application/x-7z-compressed',
]);

function matchesAt(buffer: Buffer, offset: number, bytes: number[]): boolean {
  if (buffer.length < offset + bytes.length) return false;
  return bytes.every((byte, i) => buffer[offset + i] === byte);
}

function looksLikeText(buffer: Buffer): boolean {
  if (buffer.includes(0)) return false;
  try {
    // stream: true tolerates a multi-byte sequence cut at the buffer end
    new TextDecoder('utf-8', { fatal: true }).decode(buffer, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Identify a buffer holding the beginning of a file.
 */
export function sniffBuffer(buffer: Buffer): string {
  if (buffer.length === 0) return 'application/x-empty';

  for (const signature of SIGNATURES) {
    if (!matchesAt(buffer, signature.offset, signature.bytes)) continue;
    if (signature.and && !matchesAt(buffer, signature.and.offset, signature.and.bytes)) continue;
    return signature.mime;
  }

  return looksLikeText(buffer) ? 'text/plain' : 'application/octet-stream';
}

/**
 * MIME type from file content, or null when the file cannot be read.
 */
export function sniffMimeType(filePath: string): string | null {
  let fd: number | undefined;
  try {
    fd = openSync(filePath, 'r');
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const bytesRead = readSync(fd, buffer, 0, SNIFF_BYTES, 0);
    return sniffBuffer(buffer.subarray(0, bytesRead));
  } catch {
    return null;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}

/**
 * Map a MIME type to a type category; `other` when nothing applies.
 */
export function mimeToType(mime: string | null): string {
  if (!mime) return 'other';
  if (mime.startsWith('image/')) return 'images';
  if (mime.startsWith('video/')) return 'videos';
  if (mime.startsWith('audio/')) return 'audio';
  if (mime.startsWith('text/')) return 'text';
  if (DOCUMENT_MIME_TYPES.has(mime)) return 'documents';
  if (ARCHIVE_MIME_TYPES.has(mime)) return 'archives';
  return 'other';
}
