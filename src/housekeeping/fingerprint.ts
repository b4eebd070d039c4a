const FINGERPRINT_KEY_FIELDS = ['entityId', 'deviceId', 'areaId', 'name'] as const;

/**
 * Stable identity of a proposal across planning runs: `{type}:{key}` where the
 * key is the first non-empty of entityId, deviceId, areaId, name.
 */
export function fingerprint(action: { type: string; payload: Record<string, unknown> }): string {
  let key = '';
  for (const field of FINGERPRINT_KEY_FIELDS) {
    const value = action.payload[field];
    if (typeof value === 'string' && value) {
      key = value;
      break;
    }
  }
  return `${action.type}:${key}`;
}
