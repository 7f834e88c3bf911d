/**
 * Large-object (blob/clob) helpers
 */

import type { BlobContent, ClobContent, ExternalLobReference } from '../types/index.js';

const REFERENCE_PATTERN = /^externalLob\(lf,(.*),(\d+),(\d+)\)$/;

/**
 * Textual form of an external reference: `externalLob(lf,<file>,<offset>,<length>)`
 */
export function formatLobReference(reference: ExternalLobReference): string {
  return `externalLob(lf,${reference.file},${reference.offset},${reference.length})`;
}

/**
 * Parse the textual form back into a reference, or null if the text is not one
 */
export function parseLobReference(text: string): ExternalLobReference | null {
  const match = REFERENCE_PATTERN.exec(text);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return null;
  }
  return {
    file: match[1],
    offset: Number.parseInt(match[2], 10),
    length: Number.parseInt(match[3], 10),
  };
}

/**
 * Inline bytes, or the UTF-8 bytes of the reference text when the
 * object was left external
 */
export function blobBytes(content: BlobContent): Uint8Array {
  return content.external
    ? new TextEncoder().encode(formatLobReference(content.reference))
    : content.data;
}

/**
 * Inline text, or the reference text when the object was left external
 */
export function clobText(content: ClobContent): string {
  return content.external ? formatLobReference(content.reference) : content.data;
}
