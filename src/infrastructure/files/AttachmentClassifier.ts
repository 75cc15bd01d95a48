import path from 'path';
import * as mime from 'mime-types';
import { UnsupportedAttachmentTypeError } from '../../core/errors.js';
import type { IAttachmentSource } from '../../core/interfaces/IAttachmentSource.js';

export const SNIFF_LENGTH = 512;

export const SUPPORTED_ATTACHMENT_TYPES = ['image/jpeg', 'image/png', 'image/webp', 'video/mp4'] as const;

export type AttachmentContentType = (typeof SUPPORTED_ATTACHMENT_TYPES)[number];

const CANONICAL_TYPES: Record<string, AttachmentContentType> = {
  'image/jpeg': 'image/jpeg',
  'image/jpg': 'image/jpeg',
  'image/pjpeg': 'image/jpeg',
  'image/png': 'image/png',
  'image/x-png': 'image/png',
  'image/webp': 'image/webp',
  'video/mp4': 'video/mp4',
};

interface Signature {
  mimeType: string;
  matches(header: Buffer): boolean;
}

function startsWith(header: Buffer, ...bytes: number[]): boolean {
  return header.length >= bytes.length && bytes.every((byte, i) => header[i] === byte);
}

function ascii(header: Buffer, offset: number, text: string): boolean {
  return header.length >= offset + text.length && header.toString('latin1', offset, offset + text.length) === text;
}

/**
 * ISO base media file: a leading ftyp box whose major or compatible brands start with "mp4"
 */
function isMp4(header: Buffer): boolean {
  if (header.length < 12) return false;
  const boxSize = header.readUInt32BE(0);
  if (header.length < boxSize || boxSize % 4 !== 0 || !ascii(header, 4, 'ftyp')) {
    return false;
  }
  for (let offset = 8; offset + 3 <= boxSize; offset += 4) {
    if (offset === 12) continue; // minor version
    if (ascii(header, offset, 'mp4')) return true;
  }
  return false;
}

const SIGNATURES: Signature[] = [
  { mimeType: 'image/jpeg', matches: (h) => startsWith(h, 0xff, 0xd8, 0xff) },
  { mimeType: 'image/png', matches: (h) => startsWith(h, 0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a) },
  { mimeType: 'image/webp', matches: (h) => ascii(h, 0, 'RIFF') && ascii(h, 8, 'WEBPVP') },
  { mimeType: 'video/mp4', matches: isMp4 },
];

/**
 * Magic-byte sniffing over a file header
 */
export function sniffContentType(header: Buffer): string | undefined {
  return SIGNATURES.find((signature) => signature.matches(header))?.mimeType;
}

export function canonicalizeContentType(mimeType: string): AttachmentContentType | undefined {
  const bare = mimeType.split(';')[0].trim().toLowerCase();
  if (!bare) return undefined;
  return CANONICAL_TYPES[bare];
}

/**
 * Resolve the upload content type of an attachment from its header bytes,
 * falling back to its file extension.
 *
 * Reads ahead from the source's cursor and leaves it advanced; rewind before
 * streaming the content.
 */
export async function classifyAttachment(source: IAttachmentSource): Promise<AttachmentContentType> {
  const header = Buffer.alloc(SNIFF_LENGTH);
  const bytesRead = await source.read(header);

  if (bytesRead > 0) {
    const sniffed = sniffContentType(header.subarray(0, bytesRead));
    const canonical = sniffed ? canonicalizeContentType(sniffed) : undefined;
    if (canonical) return canonical;
  }

  const extension = path.extname(source.name).toLowerCase();
  if (extension) {
    const byExtension = mime.lookup(extension);
    const canonical = byExtension ? canonicalizeContentType(byExtension) : undefined;
    if (canonical) return canonical;
  }

  throw new UnsupportedAttachmentTypeError(SUPPORTED_ATTACHMENT_TYPES);
}
