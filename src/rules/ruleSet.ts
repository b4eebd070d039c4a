import { readFile } from 'node:fs/promises';

import { z } from 'zod/v4';

export interface AreaRenameRule {
  from: string;
  to: string;
  requiresApproval: boolean;
}

export interface RegexRule {
  pattern: string;
  regex: RegExp;
  requiresApproval: boolean;
}

export interface EntityFilterRules {
  ids: string[];
  regex: RegexRule[];
}

export interface AreaPatternRule {
  pattern: string;
  regex: RegExp;
  area: string;
  overwrite: boolean;
  requiresApproval: boolean;
}

export interface HelperAreaRule {
  area: string;
  keywords: string[];
  requiresApproval: boolean;
}

export interface RuleSet {
  areaRenames: AreaRenameRule[];
  entityRemove: EntityFilterRules;
  entityHide: EntityFilterRules;
  entityArea: AreaPatternRule[];
  deviceArea: AreaPatternRule[];
  helperAreaRules: HelperAreaRule[];
}

export interface RuleProvenance {
  path: string | null;
  error?: string;
  diagnostics: string[];
}

export interface LoadedRules {
  rules: RuleSet;
  provenance: RuleProvenance;
}

export interface RuleSource {
  load(): Promise<LoadedRules>;
}

const areaRenameSchema = z.object({
  from: z.string().trim().min(1),
  to: z.string().trim().min(1),
  requires_approval: z.boolean().optional()
});

const regexEntrySchema = z.object({
  pattern: z.string().min(1),
  requires_approval: z.boolean().optional()
});

const areaPatternSchema = z.object({
  pattern: z.string().min(1),
  area: z.string().trim().min(1),
  overwrite: z.boolean().optional(),
  requires_approval: z.boolean().optional()
});

const helperAreaSchema = z.object({
  area: z.string().trim().min(1),
  keywords: z.array(z.unknown()),
  requires_approval: z.boolean().optional()
});

export function emptyRuleSet(): RuleSet {
  return {
    areaRenames: [],
    entityRemove: { ids: [], regex: [] },
    entityHide: { ids: [], regex: [] },
    entityArea: [],
    deviceArea: [],
    helperAreaRules: []
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function compileRegex(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern, 'i');
  } catch {
    return null;
  }
}

function listEntries(doc: Record<string, unknown>, key: string, diagnostics: string[]): unknown[] {
  const value = doc[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    diagnostics.push(`${key}: expected a list`);
    return [];
  }
  return value;
}

function parseFilter(doc: Record<string, unknown>, key: string, diagnostics: string[]): EntityFilterRules {
  const result: EntityFilterRules = { ids: [], regex: [] };
  const value = doc[key];
  if (value === undefined || value === null) {
    return result;
  }
  if (!isObject(value)) {
    diagnostics.push(`${key}: expected an object with ids and regex`);
    return result;
  }

  listEntries(value, 'ids', diagnostics).forEach((id, index) => {
    if (typeof id === 'string' && id.trim()) {
      result.ids.push(id.trim());
    } else {
      diagnostics.push(`${key}.ids[${index}]: expected a non-empty string`);
    }
  });

  listEntries(value, 'regex', diagnostics).forEach((entry, index) => {
    const parsed = regexEntrySchema.safeParse(entry);
    if (!parsed.success) {
      diagnostics.push(`${key}.regex[${index}]: ${describeIssues(parsed.error)}`);
      return;
    }
    const regex = compileRegex(parsed.data.pattern);
    if (!regex) {
      diagnostics.push(`${key}.regex[${index}]: invalid regex /${parsed.data.pattern}/`);
      return;
    }
    result.regex.push({
      pattern: parsed.data.pattern,
      regex,
      requiresApproval: parsed.data.requires_approval ?? true
    });
  });

  return result;
}

function parseAreaPatterns(doc: Record<string, unknown>, key: string, diagnostics: string[]): AreaPatternRule[] {
  const result: AreaPatternRule[] = [];
  listEntries(doc, key, diagnostics).forEach((entry, index) => {
    const parsed = areaPatternSchema.safeParse(entry);
    if (!parsed.success) {
      diagnostics.push(`${key}[${index}]: ${describeIssues(parsed.error)}`);
      return;
    }
    const regex = compileRegex(parsed.data.pattern);
    if (!regex) {
      diagnostics.push(`${key}[${index}]: invalid regex /${parsed.data.pattern}/`);
      return;
    }
    result.push({
      pattern: parsed.data.pattern,
      regex,
      area: parsed.data.area,
      overwrite: parsed.data.overwrite ?? false,
      requiresApproval: parsed.data.requires_approval ?? true
    });
  });
  return result;
}

/**
 * Turns an untrusted rule document into a typed rule set. Invalid entries are
 * dropped one by one; each drop leaves a diagnostic naming the entry.
 */
export function parseRuleDocument(raw: unknown): { rules: RuleSet; diagnostics: string[]; error?: string } {
  if (raw === null || raw === undefined) {
    return { rules: emptyRuleSet(), diagnostics: [] };
  }
  if (!isObject(raw)) {
    return { rules: emptyRuleSet(), diagnostics: [], error: 'Rules file root must be an object' };
  }

  const diagnostics: string[] = [];
  const rules = emptyRuleSet();

  listEntries(raw, 'area_renames', diagnostics).forEach((entry, index) => {
    const parsed = areaRenameSchema.safeParse(entry);
    if (!parsed.success) {
      diagnostics.push(`area_renames[${index}]: ${describeIssues(parsed.error)}`);
      return;
    }
    rules.areaRenames.push({
      from: parsed.data.from,
      to: parsed.data.to,
      requiresApproval: parsed.data.requires_approval ?? true
    });
  });

  rules.entityRemove = parseFilter(raw, 'entity_remove', diagnostics);
  rules.entityHide = parseFilter(raw, 'entity_hide', diagnostics);
  rules.entityArea = parseAreaPatterns(raw, 'entity_area', diagnostics);
  rules.deviceArea = parseAreaPatterns(raw, 'device_area', diagnostics);

  listEntries(raw, 'helper_area_rules', diagnostics).forEach((entry, index) => {
    const parsed = helperAreaSchema.safeParse(entry);
    if (!parsed.success) {
      diagnostics.push(`helper_area_rules[${index}]: ${describeIssues(parsed.error)}`);
      return;
    }
    const keywords = new Set<string>();
    for (const keyword of parsed.data.keywords) {
      if (typeof keyword === 'string' && keyword.trim()) {
        keywords.add(keyword.trim().toLowerCase());
      }
    }
    if (!keywords.size) {
      diagnostics.push(`helper_area_rules[${index}]: no usable keywords`);
      return;
    }
    rules.helperAreaRules.push({
      area: parsed.data.area,
      keywords: [...keywords],
      requiresApproval: parsed.data.requires_approval ?? true
    });
  });

  return { rules, diagnostics };
}

export class FileRuleSource implements RuleSource {
  constructor(private readonly path: string) {}

  async load(): Promise<LoadedRules> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error: unknown) {
      const code = isObject(error) ? error.code : undefined;
      const message = code === 'ENOENT' ? 'No rules file found' : `Cannot read rules file: ${String(error)}`;
      return { rules: emptyRuleSet(), provenance: { path: this.path, error: message, diagnostics: [] } };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error: unknown) {
      const detail = error instanceof Error ? error.message : String(error);
      return {
        rules: emptyRuleSet(),
        provenance: { path: this.path, error: `Rules file is not valid JSON: ${detail}`, diagnostics: [] }
      };
    }

    const parsed = parseRuleDocument(raw);
    return {
      rules: parsed.rules,
      provenance: {
        path: this.path,
        ...(parsed.error ? { error: parsed.error } : {}),
        diagnostics: parsed.diagnostics
      }
    };
  }
}
