/**
 * Supported media types and extension matching.
 *
 * DEFAULT_SUPPORTED_TYPES is the canonical fallback used whenever the
 * server's list cannot be fetched, so the agent always has a filter.
 * The list itself lives in data/default-media-types.json.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { SupportedTypeSet } from './types.js';

const DEFAULT_MEDIA_TYPES_FILE = new URL('../../data/default-media-types.json', import.meta.url);

/**
 * Normalize a raw extension list: lowercase, dot-prefixed, deduplicated.
 * Non-string entries are dropped.
 */
export function normalizeExtensions(raw: unknown): Set<string> {
  const result = new Set<string>();
  if (!Array.isArray(raw)) return result;

  for (const entry of raw) {
    if (typeof entry !== 'string') continue;
    const trimmed = entry.trim().toLowerCase();
    if (!trimmed) continue;
    result.add(trimmed.startsWith('.') ? trimmed : `.${trimmed}`);
  }
  return result;
}

/**
 * Build an immutable SupportedTypeSet from the server's wire format,
 * `{ image: string[], video: string[], sidecar: string[] }`. Missing or
 * malformed lists become empty sets.
 */
export function toSupportedTypeSet(wire: unknown): SupportedTypeSet {
  const doc = typeof wire === 'object' && wire !== null ? wire : {};
  return Object.freeze({
    imageExtensions: normalizeExtensions('image' in doc ? doc.image : undefined),
    videoExtensions: normalizeExtensions('video' in doc ? doc.video : undefined),
    sidecarExtensions: normalizeExtensions('sidecar' in doc ? doc.sidecar : undefined),
  });
}

function loadDefaultTypes(): SupportedTypeSet {
  const raw = fs.readFileSync(DEFAULT_MEDIA_TYPES_FILE, 'utf-8');
  return toSupportedTypeSet(JSON.parse(raw));
}

export const DEFAULT_SUPPORTED_TYPES: SupportedTypeSet = loadDefaultTypes();

/**
 * Lowercased suffix of a file name starting at its last dot,
 * or '' when the name has no dot.
 */
export function extensionOf(filePath: string): string {
  const base = path.basename(filePath);
  const dot = base.lastIndexOf('.');
  return dot === -1 ? '' : base.slice(dot).toLowerCase();
}

/**
 * Create a case-insensitive suffix filter over the given extensions.
 */
export function createExtensionFilter(extensions: Iterable<string>): (filePath: string) => boolean {
  const allowed = normalizeExtensions([...extensions]);
  return (filePath: string): boolean => {
    const ext = extensionOf(filePath);
    return ext !== '' && allowed.has(ext);
  };
}

/**
 * Filter used by the indexer and the watch loop: image extensions,
 * plus video extensions when enabled.
 */
export function createSupportedFilter(
  types: SupportedTypeSet,
  options: { includeVideo?: boolean } = {}
): (filePath: string) => boolean {
  const extensions = [...types.imageExtensions];
  if (options.includeVideo) {
    extensions.push(...types.videoExtensions);
  }
  return createExtensionFilter(extensions);
}
