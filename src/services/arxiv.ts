/**
 * Direct arXiv API integration
 * Uses the arXiv export API (Atom feed) for paper metadata search
 *
 * Rate limiting is NOT done here: the orchestrator holds the single shared limiter.
 */

import { SearchSpec } from '../config.js';
import { PaperMetadata } from '../types/index.js';
import { defaultSleep, Sleep } from './rate-limiter.js';

const DEFAULT_BASE_URL = 'https://export.arxiv.org/api/query';
const DEFAULT_RETRIES = 3;

const FIELD_PREFIX = /\b(ti|au|abs|co|jr|cat|rn|id|all):/;

/**
 * Raw document handle produced by fetchDocument and consumed by the document structurer
 */
export interface RawDocument {
  paperId: string;
  uri: string;
  metadata: PaperMetadata;
}

/**
 * Academic-search capability
 */
export interface AcademicSearch {
  searchMetadata(query: string, maxResults: number, signal?: AbortSignal): Promise<PaperMetadata[]>;
  fetchDocument(metadata: PaperMetadata, signal?: AbortSignal): Promise<RawDocument>;
}

export class ArxivSearchError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'ArxivSearchError';
  }
}

/**
 * Normalize a planner query string into arXiv search_query syntax.
 * '+' stands for a space in arXiv examples; free text without a field prefix searches all fields.
 */
export function toSearchQuery(query: string): string {
  const spaced = query.replace(/\+/g, ' ').replace(/\s+/g, ' ').trim();
  return FIELD_PREFIX.test(spaced) ? spaced : `all:${spaced}`;
}

export class ArxivSearch implements AcademicSearch {
  private readonly baseUrl: string;
  private readonly retries: number;

  constructor(options: { baseUrl?: string; retries?: number } = {}, private readonly sleep: Sleep = defaultSleep) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.retries = options.retries ?? DEFAULT_RETRIES;
  }

  /**
   * Search arXiv for papers matching the query
   * Retries only on rate limiting (429); other failures throw to the caller
   */
  async searchMetadata(query: string, maxResults: number, signal?: AbortSignal): Promise<PaperMetadata[]> {
    const searchQuery = toSearchQuery(query);
    const url = `${this.baseUrl}?search_query=${encodeURIComponent(searchQuery)}&start=0&max_results=${maxResults}&sortBy=relevance&sortOrder=descending`;

    for (let attempt = 0; attempt < this.retries; attempt++) {
      const response = await fetch(url, { signal });

      if (response.status === 429) {
        const waitTime = Math.min(5000 * (attempt + 1), 15000); // 5s, 10s, 15s max
        console.error(`[arXiv] Rate limited (429), waiting ${waitTime}ms before retry ${attempt + 1}/${this.retries}`);
        await this.sleep(waitTime);
        continue;
      }

      if (!response.ok) {
        throw new ArxivSearchError(`arXiv API error (${response.status}): ${response.statusText}`, response.status);
      }

      const papers = parseArxivXML(await response.text());
      console.error(`[arXiv] Found ${papers.length} papers for: ${searchQuery}`);
      return papers;
    }

    throw new ArxivSearchError(`arXiv API still rate limited after ${this.retries} attempts`, 429);
  }

  async fetchDocument(metadata: PaperMetadata): Promise<RawDocument> {
    const uri = metadata.pdfUrl || metadata.url;
    if (!uri) {
      throw new ArxivSearchError(`No document link for paper ${metadata.id}`);
    }
    return { paperId: metadata.id, uri, metadata };
  }
}

export function createAcademicSearch(spec: SearchSpec, sleep?: Sleep): AcademicSearch {
  switch (spec.kind) {
    case 'arxiv':
      return new ArxivSearch({ baseUrl: spec.baseUrl, retries: spec.retries }, sleep);
  }
}

/**
 * Simple XML parser for arXiv API response
 */
export function parseArxivXML(xml: string): PaperMetadata[] {
  const papers: PaperMetadata[] = [];

  // Match each <entry> block
  const entryRegex = /<entry>([\s\S]*?)<\/entry>/g;
  let match: RegExpExecArray | null;

  while ((match = entryRegex.exec(xml)) !== null) {
    const entry = match[1];

    const id = extractTag(entry, 'id');
    const title = extractTag(entry, 'title').replace(/\s+/g, ' ').trim();
    const summary = extractTag(entry, 'summary').replace(/\s+/g, ' ').trim();
    const published = extractTag(entry, 'published');

    const authorRegex = /<author>[\s\S]*?<name>(.*?)<\/name>[\s\S]*?<\/author>/g;
    const authors: string[] = [];
    let authorMatch: RegExpExecArray | null;
    while ((authorMatch = authorRegex.exec(entry)) !== null) {
      authors.push(authorMatch[1].trim());
    }

    const arxivId = id.split('/abs/')[1] || id;
    if (!arxivId) continue;

    papers.push({
      id: arxivId,
      title,
      authors,
      summary,
      published,
      url: `https://arxiv.org/abs/${arxivId}`,
      pdfUrl: `https://arxiv.org/pdf/${arxivId}`,
    });
  }

  return papers;
}

/**
 * Extract content from XML tag
 */
function extractTag(xml: string, tag: string): string {
  const regex = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)<\\/${tag}>`, 'i');
  const match = xml.match(regex);
  return match ? match[1].trim() : '';
}
