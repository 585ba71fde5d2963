import JSON5 from 'json5';

const FENCED_BLOCK = /```[^\n]*\n([\s\S]*?)```/;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    try {
      return JSON5.parse(text);
    } catch {
      return undefined;
    }
  }
}

/**
 * Slice from the first opening to the last closing bracket of the given kind
 */
function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

/**
 * Parse JSON out of a model's free-text answer
 * Accepts markdown fences, trailing commas and JSON5 syntax, and surrounding prose.
 */
export function parseJsonResponse(content: string): unknown {
  const trimmed = content.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  const candidate = fenced?.[1]?.trim() ?? trimmed.replace(/^```[^\n]*\n?/, '').replace(/```$/, '');

  const candidates = [
    candidate,
    sliceBetween(candidate, '{', '}'),
    sliceBetween(candidate, '[', ']'),
  ];

  for (const text of candidates) {
    if (text === null) continue;
    const parsed = tryParse(text);
    if (parsed !== undefined) {
      return parsed;
    }
  }

  throw new Error('Failed to parse JSON response');
}
