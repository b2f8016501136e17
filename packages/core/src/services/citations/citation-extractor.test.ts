import { describe, it, expect, vi } from 'vitest';
import type { LlmClient, LlmRequest } from '../../llm/llm-client.js';
import { extractCitations } from './citation-extractor.js';

function createLlm(payload: unknown): LlmClient & { invoke: ReturnType<typeof vi.fn> } {
  return {
    invoke: vi.fn().mockResolvedValue({ content: JSON.stringify(payload) }),
  };
}

describe('extractCitations', () => {
  it('should normalise blank and placeholder fields to null', async () => {
    const llm = createLlm({
      citations: [
        {
          rawCitation: ' Doe, J. (2020). A Study of Testing. Journal of Examples, 1-10. ',
          authors: 'Doe, J.',
          year: 2020,
          title: 'A Study of Testing',
          venue: '',
          pages: 'N/A',
        },
      ],
    });

    const citations = await extractCitations('text', llm);

    expect(citations).toEqual([
      {
        rawCitation: 'Doe, J. (2020). A Study of Testing. Journal of Examples, 1-10.',
        authors: 'Doe, J.',
        year: '2020',
        title: 'A Study of Testing',
        venue: null,
        pages: null,
      },
    ]);
  });

  it('should treat missing fields as null', async () => {
    const llm = createLlm({ citations: [{ rawCitation: 'Roe (1999)' }] });

    expect(await extractCitations('text', llm)).toEqual([
      { rawCitation: 'Roe (1999)', authors: null, year: null, title: null, venue: null, pages: null },
    ]);
  });

  it('should drop entries without a raw citation and cap the list', async () => {
    const llm = createLlm({
      citations: [
        { rawCitation: '', title: 'Orphan' },
        { rawCitation: 'First (2001)' },
        { rawCitation: 'Second (2002)' },
        { rawCitation: 'Third (2003)' },
      ],
    });

    const citations = await extractCitations('text', llm, { maxCitations: 2 });

    expect(citations.map((c) => c.rawCitation)).toEqual(['First (2001)', 'Second (2002)']);
  });

  it('should send the text and the limit to the model', async () => {
    const llm = createLlm({ citations: [] });

    expect(await extractCitations('No references here.', llm, { maxCitations: 5 })).toEqual([]);

    const [request] = llm.invoke.mock.calls[0] as [LlmRequest];
    expect(request.userMessage).toBe('No references here.');
    expect(request.systemPrompt).toContain('Return at most 5 citations');
    expect(request.jsonSchema).toBeDefined();
  });
});
