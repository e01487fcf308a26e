import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import { createLogger } from '../services/logger/logger.js';
import { ConfigurationError, getErrorMessage } from '../utils/errors.js';
import { hostOf } from '../utils/url.js';
import type { SiteDescriptor } from '../services/probe/types.js';

const log = createLogger('sites');

const siteFieldsSchema = z.object({
  name: z.string().min(1).optional(),
  url: z.string().min(1).optional(),
  template: z.string().min(1).optional(),
  evidence_regex: z.union([z.string(), z.array(z.string())]).optional(),
});

type SiteFields = z.infer<typeof siteFieldsSchema>;

// --- Accepted source shapes ---

type RawEntry =
  | { kind: 'template'; template: string; name?: string }
  | { kind: 'fields'; fields: SiteFields; name?: string }
  | { kind: 'invalid'; reason: string; name?: string };

type RawSiteList =
  | { kind: 'list'; entries: unknown[] }
  | { kind: 'mapping'; entries: Array<[string, unknown]> }
  | { kind: 'unrecognized'; found: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function classifyRoot(raw: unknown): RawSiteList {
  if (Array.isArray(raw)) return { kind: 'list', entries: raw };
  if (isRecord(raw)) return { kind: 'mapping', entries: Object.entries(raw) };
  return { kind: 'unrecognized', found: raw === null ? 'null' : typeof raw };
}

function classifyEntry(value: unknown, name?: string): RawEntry {
  if (typeof value === 'string') return { kind: 'template', template: value, name };
  if (isRecord(value)) {
    const parsed = siteFieldsSchema.safeParse(value);
    if (!parsed.success) {
      return { kind: 'invalid', reason: parsed.error.issues[0]?.message ?? 'invalid fields', name };
    }
    return { kind: 'fields', fields: parsed.data, name };
  }
  return { kind: 'invalid', reason: `unsupported entry type ${typeof value}`, name };
}

function toPatterns(evidence: SiteFields['evidence_regex']): string[] {
  if (evidence === undefined) return [];
  return typeof evidence === 'string' ? [evidence] : evidence;
}

function toDescriptor(entry: RawEntry): SiteDescriptor | null {
  switch (entry.kind) {
    case 'template':
      return {
        name: entry.name ?? hostOf(entry.template) ?? entry.template,
        urlTemplate: entry.template,
        evidencePatterns: [],
      };
    case 'fields': {
      const urlTemplate = entry.fields.url ?? entry.fields.template;
      if (!urlTemplate) {
        log.warn({ site: entry.fields.name ?? entry.name }, 'Skipping site entry without a URL');
        return null;
      }
      return {
        name: entry.fields.name ?? entry.name ?? hostOf(urlTemplate) ?? 'site',
        urlTemplate,
        evidencePatterns: toPatterns(entry.fields.evidence_regex),
      };
    }
    case 'invalid':
      log.warn({ site: entry.name, reason: entry.reason }, 'Skipping malformed site entry');
      return null;
  }
}

/**
 * Normalise any accepted site-list shape into descriptors:
 *   - list of mappings: [{ name, url | template, evidence_regex }]
 *   - list of strings:  ['https://site/{user}']
 *   - mapping:          { GitHub: 'https://...', Reddit: { url, evidence_regex } }
 * Entries without a URL are dropped.
 */
export function normalizeSites(raw: unknown): SiteDescriptor[] {
  const root = classifyRoot(raw);
  let entries: RawEntry[];

  switch (root.kind) {
    case 'list':
      entries = root.entries.map((value) => classifyEntry(value));
      break;
    case 'mapping':
      entries = root.entries.map(([name, value]) => classifyEntry(value, name));
      break;
    case 'unrecognized':
      throw new ConfigurationError(`Site list format not recognized (got ${root.found}). Use a list or a mapping.`);
  }

  const sites: SiteDescriptor[] = [];
  for (const entry of entries) {
    const site = toDescriptor(entry);
    if (site) sites.push(Object.freeze({ ...site, evidencePatterns: Object.freeze([...site.evidencePatterns]) }));
  }
  return sites;
}

export async function loadSites(file: string): Promise<SiteDescriptor[]> {
  let raw: unknown;
  try {
    raw = parse(await readFile(file, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Could not read site list ${file}: ${getErrorMessage(error)}`, { file, cause: error });
  }

  const sites = normalizeSites(raw);
  log.info({ file, count: sites.length }, 'Loaded site list');
  return sites;
}
