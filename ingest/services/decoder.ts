import { DecodeError } from '../lib/errors.js';

interface EncodingCandidate {
  name: string;
  label: string;
  ignoreBOM: boolean;
}

/**
 * Tried in order; the first one that decodes without a fatal error wins.
 * The WHATWG `big5` decoder is Big5-HKSCS, a superset of CP950, so it
 * stands in for both.
 */
const ENCODING_CANDIDATES: readonly EncodingCandidate[] = Object.freeze([
  { name: 'utf-8-sig', label: 'utf-8', ignoreBOM: false },
  { name: 'utf-8', label: 'utf-8', ignoreBOM: true },
  { name: 'big5', label: 'big5', ignoreBOM: true },
]);

export const DECODE_ATTEMPT_ORDER: readonly string[] = Object.freeze(ENCODING_CANDIDATES.map((c) => c.name));

export interface DecodedContent {
  text: string;
  encoding: string;
}

export function decodeWithEncoding(bytes: Uint8Array): DecodedContent {
  for (const candidate of ENCODING_CANDIDATES) {
    const decoder = new TextDecoder(candidate.label, { fatal: true, ignoreBOM: candidate.ignoreBOM });
    try {
      return { text: decoder.decode(bytes), encoding: candidate.name };
    } catch (err: unknown) {
      if (!(err instanceof TypeError)) throw err;
    }
  }
  throw new DecodeError(DECODE_ATTEMPT_ORDER);
}

/** Raw publisher bytes → text. Throws DecodeError when no candidate fits. */
export function decodeContent(bytes: Uint8Array): string {
  return decodeWithEncoding(bytes).text;
}
