import type { SourceReference } from '@factlens/shared/src/types/verification.types.js';
import type { WebSearchResult } from '../web-search/types.js';

const MAX_SUMMARY_CHARS = 2000;

export function hasEvidence(result: WebSearchResult): boolean {
  return result.sources.length > 0 || result.content.trim().length > 0;
}

/** Renders a search result as the evidence block given to the model. */
export function formatSearchResults(result: WebSearchResult): string {
  const lines: string[] = [];

  const summary = result.content.trim();
  if (summary) {
    lines.push(`Summary: ${summary.slice(0, MAX_SUMMARY_CHARS)}`);
  }

  for (const source of result.sources) {
    const snippet = source.snippet.trim();
    lines.push(snippet ? `- ${source.title}: ${snippet}` : `- ${source.title} (${source.url})`);
  }

  return lines.join('\n');
}

export function toSourceReferences(result: WebSearchResult, max: number): SourceReference[] {
  return result.sources.slice(0, max).map(({ title, url }) => ({ title, url }));
}
