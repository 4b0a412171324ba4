/**
 * Biomedical Concept Catalog
 *
 * Source of concept titles when codes are assigned to activities.
 * Precedence: JSON override (CONCEPTS_JSON) > cached remote fetch > empty list.
 *
 * Freeze, Diff and Rollback never consult the catalog; snapshots carry the
 * titles captured at assignment time.
 */

import axios from 'axios';
import { config } from '../../config/environment';
import { logger } from '../../config/logger';

export interface CatalogConcept {
  code: string;
  title: string;
}

export type CatalogSource = 'override' | 'remote' | 'skipped' | 'none';

export interface CatalogStatus {
  source: CatalogSource;
  count: number;
  fetched_at: string | null;
  last_status: number | null;
  last_error: string | null;
}

interface CatalogCache {
  data: CatalogConcept[];
  fetchedAt: number;
  source: CatalogSource;
  lastStatus: number | null;
  lastError: string | null;
}

const cache: CatalogCache = {
  data: [],
  fetchedAt: 0,
  source: 'none',
  lastStatus: null,
  lastError: null
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const firstText = (item: Record<string, unknown>, keys: string[]): string | null => {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === 'string' && value.trim() !== '') return value.trim();
    if (typeof value === 'number') return String(value);
  }
  return null;
};

const CODE_KEYS = ['concept_code', 'code', 'conceptId', 'id', 'identifier'];
const TITLE_KEYS = ['title', 'name', 'label'];

/**
 * Pull concept items out of the shapes the catalog has been seen to return:
 * a plain list, `{ items: [...] }`, a HAL document whose
 * `_links.biomedicalConcepts` hrefs end in the concept code, or one object.
 */
export const extractConceptItems = (data: unknown): unknown[] => {
  if (Array.isArray(data)) {
    return data;
  }
  if (!isRecord(data)) {
    return [];
  }
  if (Array.isArray(data.items)) {
    return data.items;
  }
  if (isRecord(data._links)) {
    const links = data._links.biomedicalConcepts;
    if (!Array.isArray(links)) return [];

    const items: unknown[] = [];
    for (const link of links) {
      if (!isRecord(link) || typeof link.href !== 'string') continue;
      const code = link.href.replace(/^\/+|\/+$/g, '').split('/').pop();
      if (code) {
        items.push({ concept_code: code, title: typeof link.title === 'string' ? link.title : code });
      }
    }
    return items;
  }
  return [data];
};

/**
 * Normalize raw items to `{ code, title }`, sorted case-insensitively by title.
 */
export const normalizeConcepts = (items: unknown[]): CatalogConcept[] => {
  const concepts: CatalogConcept[] = [];
  for (const item of items) {
    if (!isRecord(item)) continue;
    const code = firstText(item, CODE_KEYS);
    if (!code) continue;
    concepts.push({ code, title: firstText(item, TITLE_KEYS) ?? code });
  }
  return concepts.sort((a, b) => {
    const left = a.title.toLowerCase();
    const right = b.title.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
};

const store = (data: CatalogConcept[], source: CatalogSource): CatalogConcept[] => {
  cache.data = data;
  cache.fetchedAt = Date.now();
  cache.source = source;
  return data;
};

const loadOverride = (overrideJson: string): CatalogConcept[] | null => {
  try {
    const concepts = normalizeConcepts(extractConceptItems(JSON.parse(overrideJson)));
    logger.info('Loaded concepts from override', { count: concepts.length });
    return concepts;
  } catch (error) {
    logger.warn('Concept override is not valid JSON; falling back to remote catalog', {
      error: error instanceof Error ? error.message : String(error)
    });
    return null;
  }
};

const fetchRemote = async (): Promise<CatalogConcept[]> => {
  const { apiUrl, apiKey, requestTimeoutMs } = config.concepts;
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (apiKey) {
    headers['api-key'] = apiKey;
  }

  try {
    const response = await axios.get<unknown>(apiUrl, { headers, timeout: requestTimeoutMs });
    cache.lastStatus = response.status;
    cache.lastError = null;

    let data = response.data;
    if (typeof data === 'string') {
      data = JSON.parse(data);
    }

    const concepts = normalizeConcepts(extractConceptItems(data));
    logger.info('Fetched concepts from remote catalog', { url: apiUrl, count: concepts.length });
    return concepts;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      cache.lastStatus = error.response?.status ?? null;
    }
    cache.lastError = error instanceof Error ? error.message : String(error);
    logger.error('Concept catalog fetch failed', { url: apiUrl, status: cache.lastStatus, error: cache.lastError });
    return [];
  }
};

/**
 * Concepts as `[{ code, title }]` sorted by title. Results are cached for
 * the configured TTL unless `force` is set.
 */
export const fetchBiomedicalConcepts = async (force = false): Promise<CatalogConcept[]> => {
  const { overrideJson, skipRemote, cacheTtlMs } = config.concepts;

  if (!force && cache.data.length > 0 && Date.now() - cache.fetchedAt < cacheTtlMs) {
    return cache.data;
  }

  if (overrideJson) {
    const concepts = loadOverride(overrideJson);
    if (concepts) {
      return store(concepts, 'override');
    }
  }

  if (skipRemote) {
    logger.warn('Remote concept catalog disabled; concept list empty');
    return store([], 'skipped');
  }

  return store(await fetchRemote(), 'remote');
};

/**
 * Title for a concept code, or null when the catalog does not know it.
 */
export const lookupConceptTitle = async (code: string): Promise<string | null> => {
  const concepts = await fetchBiomedicalConcepts();
  return concepts.find(concept => concept.code === code)?.title ?? null;
};

export const refreshConcepts = async (): Promise<CatalogStatus> => {
  await fetchBiomedicalConcepts(true);
  return getCatalogStatus();
};

export const getCatalogStatus = (): CatalogStatus => ({
  source: cache.source,
  count: cache.data.length,
  fetched_at: cache.fetchedAt ? new Date(cache.fetchedAt).toISOString() : null,
  last_status: cache.lastStatus,
  last_error: cache.lastError
});

export const clearConceptCache = (): void => {
  store([], 'none');
  cache.fetchedAt = 0;
  cache.lastStatus = null;
  cache.lastError = null;
};
