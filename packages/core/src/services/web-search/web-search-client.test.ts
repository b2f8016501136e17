import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigurationError, WebSearchError } from '@factlens/shared/src/utils/errors.js';
import { createMockWebSearchClient, DEFAULT_MOCK_SEARCH_RESPONSE } from './mock-web-search-client.js';
import type { MockWebSearchResponse } from './mock-web-search-client.js';
import { createWebSearchClient, extractSources } from './web-search-client.js';

const genai = vi.hoisted(() => {
  const clientOptions: Array<Record<string, unknown>> = [];
  return { generateContent: vi.fn(), clientOptions };
});

vi.mock('@google/genai', () => ({
  GoogleGenAI: class {
    readonly models = { generateContent: genai.generateContent };

    constructor(options: Record<string, unknown>) {
      genai.clientOptions.push(options);
    }
  },
}));

describe('MockWebSearchClient', () => {
  it('should return the default response for unknown queries', async () => {
    const client = createMockWebSearchClient();
    const result = await client.search('test query');

    expect(result.query).toBe('test query');
    expect(result.content).toBe(DEFAULT_MOCK_SEARCH_RESPONSE.content);
    expect(result.sources).toHaveLength(2);
  });

  it('should return configured responses for known queries', async () => {
    const responses = new Map<string, MockWebSearchResponse>();
    responses.set('sky color', {
      content: 'The sky is blue.',
      sources: [{ title: 'Sky', url: 'https://sky.example.com', snippet: 'Rayleigh scattering' }],
    });

    const client = createMockWebSearchClient(responses);

    const known = await client.search('sky color');
    expect(known.content).toBe('The sky is blue.');
    expect(known.sources).toEqual([
      { title: 'Sky', url: 'https://sky.example.com', snippet: 'Rayleigh scattering' },
    ]);

    const unknown = await client.search('something else');
    expect(unknown.content).toBe(DEFAULT_MOCK_SEARCH_RESPONSE.content);
  });
});

describe('createWebSearchClient', () => {
  const config = {
    projectId: 'test-project',
    location: 'europe-west1',
    model: 'gemini-2.0-flash',
    retryBaseDelayMs: 0,
  };

  const groundedResponse = {
    text: 'Water boils at 100 degrees Celsius at sea level.',
    candidates: [
      {
        groundingMetadata: {
          groundingChunks: [{ web: { uri: 'https://chem.example.com/water', title: 'chem.example.com' } }],
          groundingSupports: [
            { segment: { text: 'Water boils at 100 degrees Celsius.' }, groundingChunkIndices: [0] },
          ],
        },
      },
    ],
  };

  beforeEach(() => {
    genai.generateContent.mockReset();
    genai.clientOptions.length = 0;
  });

  it('should require a project ID', () => {
    expect(() =>
      createWebSearchClient({ projectId: '', location: 'europe-west1', model: 'gemini-2.0-flash' }),
    ).toThrow(ConfigurationError);
  });

  it('should run a grounded search and map text and sources', async () => {
    genai.generateContent.mockResolvedValue(groundedResponse);
    const client = createWebSearchClient(config);

    const result = await client.search('water boiling point', 'Fact-checking the claim: "x"');

    expect(result).toEqual({
      query: 'water boiling point',
      content: 'Water boils at 100 degrees Celsius at sea level.',
      sources: [
        {
          title: 'chem.example.com',
          url: 'https://chem.example.com/water',
          snippet: 'Water boils at 100 degrees Celsius.',
        },
      ],
    });
    expect(genai.clientOptions).toEqual([
      { vertexai: true, project: 'test-project', location: 'europe-west1' },
    ]);
    expect(genai.generateContent).toHaveBeenCalledWith({
      model: 'gemini-2.0-flash',
      contents:
        'Fact-checking the claim: "x"\n\nSearch the web and summarize what reliable sources say about:\nwater boiling point',
      config: { tools: [{ googleSearch: {} }] },
    });
  });

  it('should treat a missing answer text as empty content', async () => {
    genai.generateContent.mockResolvedValue({});
    const client = createWebSearchClient(config);

    expect(await client.search('obscure query')).toEqual({
      query: 'obscure query',
      content: '',
      sources: [],
    });
  });

  it('should retry transient failures before succeeding', async () => {
    genai.generateContent
      .mockRejectedValueOnce(Object.assign(new Error('unavailable'), { status: 503 }))
      .mockResolvedValueOnce(groundedResponse);
    const client = createWebSearchClient(config);

    const result = await client.search('water boiling point');

    expect(result.sources).toHaveLength(1);
    expect(genai.generateContent).toHaveBeenCalledTimes(2);
  });

  it('should throw a retryable WebSearchError once retries run out', async () => {
    genai.generateContent.mockRejectedValue(new Error('rate limit exceeded'));
    const client = createWebSearchClient(config);

    const promise = client.search('water boiling point');

    await expect(promise).rejects.toBeInstanceOf(WebSearchError);
    await expect(promise).rejects.toMatchObject({
      retryable: true,
      message: 'Web search failed after 3 retries: rate limit exceeded',
    });
    expect(genai.generateContent).toHaveBeenCalledTimes(3);
  });

  it('should fail fast on permanent errors', async () => {
    genai.generateContent.mockRejectedValue(new Error('permission denied'));
    const client = createWebSearchClient(config);

    await expect(client.search('water boiling point')).rejects.toMatchObject({
      retryable: false,
      message: 'Web search failed: permission denied',
    });
    expect(genai.generateContent).toHaveBeenCalledTimes(1);
  });
});

describe('extractSources', () => {
  it('should map grounding chunks to sources with snippets from supports', () => {
    const sources = extractSources({
      text: 'The earth is an oblate spheroid.',
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              { web: { uri: 'https://nasa.example.com/earth', title: 'nasa.example.com' } },
              { web: { uri: 'https://atlas.example.com/shape', title: 'atlas.example.com' } },
            ],
            groundingSupports: [
              { segment: { text: 'The earth is round.' }, groundingChunkIndices: [0, 1] },
              { segment: { text: 'It bulges at the equator.' }, groundingChunkIndices: [1] },
            ],
          },
        },
      ],
    });

    expect(sources).toEqual([
      {
        title: 'nasa.example.com',
        url: 'https://nasa.example.com/earth',
        snippet: 'The earth is round.',
      },
      {
        title: 'atlas.example.com',
        url: 'https://atlas.example.com/shape',
        snippet: 'The earth is round. It bulges at the equator.',
      },
    ]);
  });

  it('should deduplicate chunks by URL and default the title to the URL', () => {
    const sources = extractSources({
      candidates: [
        {
          groundingMetadata: {
            groundingChunks: [
              { web: { uri: 'https://a.example.com' } },
              { web: { uri: 'https://a.example.com', title: 'Duplicate' } },
              { web: {} },
            ],
          },
        },
      ],
    });

    expect(sources).toEqual([
      { title: 'https://a.example.com', url: 'https://a.example.com', snippet: '' },
    ]);
  });

  it('should return no sources when there is no grounding metadata', () => {
    expect(extractSources({ text: 'nothing grounded' })).toEqual([]);
  });
});
