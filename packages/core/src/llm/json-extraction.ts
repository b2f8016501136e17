/**
 * Extracts a JSON value from model output that may wrap it in markdown fences
 * or surround it with prose.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const strategies: Array<(text: string) => unknown> = [
    parseDirect,
    parseFenced,
    (text) => parseBalanced(text, '{', '}'),
    (text) => parseBalanced(text, '[', ']'),
  ];

  for (const strategy of strategies) {
    const value = strategy(trimmed);
    if (value !== undefined) {
      return value;
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function parseDirect(text: string): unknown {
  return tryParse(text);
}

function parseFenced(text: string): unknown {
  const match = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/.exec(text);
  return match?.[1] ? tryParse(match[1].trim()) : undefined;
}

function parseBalanced(text: string, open: string, close: string): unknown {
  const startIdx = text.indexOf(open);
  if (startIdx === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = startIdx; i < text.length; i++) {
    const ch = text[i];

    if (escaped) {
      escaped = false;
    } else if (inString) {
      if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      inString = true;
    } else if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) {
        return tryParse(text.slice(startIdx, i + 1));
      }
    }
  }

  return undefined;
}
