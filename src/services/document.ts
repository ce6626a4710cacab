/**
 * Document-structuring capability: raw paper document → analyzable text
 */

import { ArxivClient, callArxivTool, createArxivClient } from '../clients/arxiv.js';
import { DocumentSpec, Env } from '../config.js';
import { RawDocument } from './arxiv.js';

export interface DocumentStructurer {
  toStructuredText(document: RawDocument, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

/**
 * Offline structurer: title, authors and abstract from the search metadata, no download
 */
export class AbstractStructurer implements DocumentStructurer {
  async toStructuredText(document: RawDocument): Promise<string> {
    const { metadata } = document;
    if (!metadata.summary.trim()) {
      throw new Error(`Paper ${document.paperId} has no abstract`);
    }
    const lines = [`# ${metadata.title || document.paperId}`];
    if (metadata.authors.length) lines.push(`Authors: ${metadata.authors.join(', ')}`);
    if (metadata.published) lines.push(`Published: ${metadata.published}`);
    lines.push('', '## Abstract', metadata.summary);
    return lines.join('\n');
  }

  async close(): Promise<void> {}
}

/**
 * Full-text structurer through the arXiv MCP server (download_paper → read_paper, markdown out).
 * The subprocess is spawned lazily on first use and shared by all concurrent analyzers.
 */
export class ArxivMcpStructurer implements DocumentStructurer {
  private clientPromise: Promise<ArxivClient> | null = null;

  constructor(private readonly connect: () => Promise<ArxivClient>) {}

  private getClient(): Promise<ArxivClient> {
    if (!this.clientPromise) {
      this.clientPromise = this.connect();
      // A failed spawn must not poison later attempts
      this.clientPromise.catch(() => {
        this.clientPromise = null;
      });
    }
    return this.clientPromise;
  }

  async toStructuredText(document: RawDocument, signal?: AbortSignal): Promise<string> {
    const { client } = await this.getClient();
    await callArxivTool(client, 'download_paper', document.paperId, signal);
    const text = await callArxivTool(client, 'read_paper', document.paperId, signal);
    if (!text.trim()) {
      throw new Error(`read_paper returned no text for ${document.paperId}`);
    }
    return text;
  }

  async close(): Promise<void> {
    if (!this.clientPromise) return;
    const pending = this.clientPromise;
    this.clientPromise = null;
    const client = await pending.catch(() => null);
    if (client) await client.close();
  }
}

export function createDocumentStructurer(spec: DocumentSpec, env: Env): DocumentStructurer {
  switch (spec.kind) {
    case 'arxiv-mcp':
      return new ArxivMcpStructurer(() => createArxivClient(env, spec.storagePath));
    case 'abstract':
      return new AbstractStructurer();
  }
}
