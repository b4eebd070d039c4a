import { join } from 'node:path';

import { z } from 'zod/v4';

export type SafeMode = 'read_write' | 'read_only';

export interface AppConfig {
  registryUrl: string;
  registryToken?: string;
  requestTimeoutMs: number;
  connectTimeoutMs: number;

  dataDir: string;
  rulesPath: string;
  fallbackAreaName: string;

  safeMode: SafeMode;
  requireConfirm: boolean;

  logLevel: string;
  logPretty: boolean;

  journalMaxEntries: number;
  journalPersistPath?: string;
}

const envSchema = z.object({
  HOUSEKEEPER_REGISTRY_URL: z.string().optional(),
  HOUSEKEEPER_REGISTRY_TOKEN: z.string().optional(),
  SUPERVISOR_TOKEN: z.string().optional(),
  HOUSEKEEPER_REQUEST_TIMEOUT_MS: z.string().optional(),
  HOUSEKEEPER_CONNECT_TIMEOUT_MS: z.string().optional(),

  HOUSEKEEPER_DATA_DIR: z.string().optional(),
  HOUSEKEEPER_RULES_PATH: z.string().optional(),
  HOUSEKEEPER_FALLBACK_AREA_NAME: z.string().optional(),

  HOUSEKEEPER_SAFE_MODE: z.string().optional(),
  HOUSEKEEPER_REQUIRE_CONFIRM: z.string().optional(),

  HOUSEKEEPER_LOG_LEVEL: z.string().optional(),
  HOUSEKEEPER_LOG_PRETTY: z.string().optional(),

  HOUSEKEEPER_JOURNAL_MAX_ENTRIES: z.string().optional(),
  HOUSEKEEPER_JOURNAL_PERSIST_PATH: z.string().optional()
});

function normalizeRegistryUrl(raw?: string): string {
  const fallback = 'http://homeassistant.local:8123';
  if (!raw || !raw.trim()) {
    return fallback;
  }

  const trimmed = raw.trim().replace(/\/+$/, '');
  try {
    const parsed = new URL(trimmed);
    // Tokens belong in HOUSEKEEPER_REGISTRY_TOKEN, never in the URL.
    parsed.username = '';
    parsed.password = '';
    parsed.searchParams.delete('access_token');
    return parsed.toString().replace(/\/+$/, '');
  } catch {
    throw new Error(`Invalid HOUSEKEEPER_REGISTRY_URL: ${raw}`);
  }
}

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseSafeMode(raw: string | undefined): SafeMode {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'read_only') {
    return 'read_only';
  }
  return 'read_write';
}

function parseOptionalString(raw: string | undefined): string | undefined {
  const trimmed = raw?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const dataDir = parseOptionalString(parsed.HOUSEKEEPER_DATA_DIR) ?? './data';

  return {
    registryUrl: normalizeRegistryUrl(parsed.HOUSEKEEPER_REGISTRY_URL),
    registryToken: parseOptionalString(parsed.HOUSEKEEPER_REGISTRY_TOKEN) ?? parseOptionalString(parsed.SUPERVISOR_TOKEN),
    requestTimeoutMs: parseNumber(parsed.HOUSEKEEPER_REQUEST_TIMEOUT_MS, 30_000, 500, 300_000),
    connectTimeoutMs: parseNumber(parsed.HOUSEKEEPER_CONNECT_TIMEOUT_MS, 10_000, 500, 120_000),

    dataDir,
    rulesPath: parseOptionalString(parsed.HOUSEKEEPER_RULES_PATH) ?? join(dataDir, 'rules.json'),
    fallbackAreaName: parseOptionalString(parsed.HOUSEKEEPER_FALLBACK_AREA_NAME) ?? 'Unassigned',

    safeMode: parseSafeMode(parsed.HOUSEKEEPER_SAFE_MODE),
    requireConfirm: parseBoolean(parsed.HOUSEKEEPER_REQUIRE_CONFIRM, true),

    logLevel: parsed.HOUSEKEEPER_LOG_LEVEL?.trim() || 'info',
    logPretty: parseBoolean(parsed.HOUSEKEEPER_LOG_PRETTY, false),

    journalMaxEntries: parseNumber(parsed.HOUSEKEEPER_JOURNAL_MAX_ENTRIES, 2_000, 100, 1_000_000),
    journalPersistPath: parseOptionalString(parsed.HOUSEKEEPER_JOURNAL_PERSIST_PATH)
  };
}
