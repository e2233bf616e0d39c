import { fileTypeFromBuffer } from 'file-type';

import { createDecodeError } from '../../errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** Media type detected from the payload's magic bytes, or `undefined` when unrecognised. */
export async function sniffMime(body: Uint8Array): Promise<string | undefined> {
  const detected = await fileTypeFromBuffer(body);
  return detected?.mime;
}

export function normalizeMime(value: string): string {
  const [essence = ''] = value.split(';');
  return essence.trim().toLowerCase();
}

export function decodeText(body: Uint8Array, url: string): string {
  try {
    return utf8.decode(body);
  } catch (error) {
    throw createDecodeError('Response body is not valid UTF-8', { url, bytes: body.byteLength }, { cause: error });
  }
}
