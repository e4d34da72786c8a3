import { decodeHTML } from 'entities';
import type { AttributeMap } from '../types/Catalog.js';
import { stripMatchingQuotes } from './rowParser.js';

/**
 * Decode the free-text column into sub-attributes.
 *
 * `size=M§note="ok"§clearance` → { size: 'M', note: 'ok', clearance: '' }
 */
export function parseAttributes(value: string | undefined, separator: string): AttributeMap {
  const attributes = new Map<string, string>();
  if (!value) return attributes;

  for (const pair of value.split(separator)) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) {
      attributes.set(pair.trim(), '');
      continue;
    }

    const subKey = pair.slice(0, eqIdx).trim();
    const subValue = decodeHTML(pair.slice(eqIdx + 1).trim());
    attributes.set(subKey, stripMatchingQuotes(subValue));
  }

  return attributes;
}
