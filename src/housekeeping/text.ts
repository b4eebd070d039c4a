const TOKEN_SPLIT = /[^a-z0-9]+/;

// base id, underscore, then 2-9 or any number of two or more digits without a leading zero
const SUFFIX_DUPLICATE = /^(.+)_([2-9]|[1-9][0-9]+)$/;

const GENERIC_MEDIA_NAMES = new Set([
  'tv',
  'speaker',
  'speakers',
  'chromecast',
  'google cast',
  'google home',
  'media player',
  'mediaplayer',
  'nest audio',
  'nest mini',
  'home',
  'default',
  'unknown'
]);

export const HELPER_ENTITY_PREFIXES = ['input_', 'sensor.', 'template.'] as const;

export type MediaBaseLabel = 'TV' | 'Speaker' | 'Beamer' | 'Media';

export function normalizeName(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

export function tokenize(value: string | null | undefined): Set<string> {
  const normalized = normalizeName(value);
  if (!normalized) {
    return new Set();
  }
  return new Set(normalized.split(TOKEN_SPLIT).filter(Boolean));
}

export function isSubset(subset: ReadonlySet<string>, superset: ReadonlySet<string>): boolean {
  for (const token of subset) {
    if (!superset.has(token)) {
      return false;
    }
  }
  return true;
}

export function intersects(left: Iterable<string>, right: ReadonlySet<string>): boolean {
  for (const token of left) {
    if (right.has(token)) {
      return true;
    }
  }
  return false;
}

/** `sensor.kitchen_temp_2` -> `sensor.kitchen_temp`; null when the id carries no duplicate suffix. */
export function suffixDuplicateBase(entityId: string): string | null {
  const match = SUFFIX_DUPLICATE.exec(entityId);
  return match?.[1] ?? null;
}

export function isGenericMediaName(name: string | null | undefined): boolean {
  const normalized = normalizeName(name);
  if (!normalized) {
    return true;
  }
  return GENERIC_MEDIA_NAMES.has(normalized) || normalized.startsWith('media player');
}

export function mediaBaseLabel(entityId: string, currentName: string): MediaBaseLabel {
  const haystack = `${normalizeName(entityId)} ${normalizeName(currentName)}`;
  if (haystack.includes('tv')) {
    return 'TV';
  }
  if (haystack.includes('speaker') || haystack.includes('sonos') || haystack.includes('nest')) {
    return 'Speaker';
  }
  if (haystack.includes('beamer') || haystack.includes('projector')) {
    return 'Beamer';
  }
  return 'Media';
}

export function isHelperEntityId(entityId: string): boolean {
  return HELPER_ENTITY_PREFIXES.some((prefix) => entityId.startsWith(prefix));
}
