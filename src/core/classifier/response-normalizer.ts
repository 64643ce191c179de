/**
 * Response Normalizer
 *
 * Pulls the JSON object out of a model reply that may be wrapped in prose or
 * markdown fences, and patches up replies that were cut off mid-object.
 * The repair is a bracket-counting heuristic, not a JSON parser: it appends
 * missing closers and gives up if the result still does not balance.
 */

import { errors } from '../../utils/errors.js';

const LEADING_FENCE = /^```[\w-]*\s*/;
const TRAILING_FENCE = /\s*```$/;

interface ScanCounts {
  openBraces: number;
  closeBraces: number;
  openBrackets: number;
  closeBrackets: number;
  quotes: number;
}

/**
 * Remove a markdown code fence from the start and end of the reply
 */
export function stripCodeFence(text: string): string {
  return text.trim().replace(LEADING_FENCE, '').replace(TRAILING_FENCE, '').trim();
}

/**
 * Count structural characters outside string literals, and unescaped quotes
 */
function scan(text: string): ScanCounts {
  const counts: ScanCounts = { openBraces: 0, closeBraces: 0, openBrackets: 0, closeBrackets: 0, quotes: 0 };
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      counts.quotes++;
      continue;
    }
    if (inString) continue;

    switch (char) {
      case '{':
        counts.openBraces++;
        break;
      case '}':
        counts.closeBraces++;
        break;
      case '[':
        counts.openBrackets++;
        break;
      case ']':
        counts.closeBrackets++;
        break;
    }
  }

  return counts;
}

/**
 * Append the closers a truncated object is missing. All counts come from the
 * input as given, so brackets, braces and the quote are appended in one go.
 */
export function repairJson(text: string): string {
  const counts = scan(text);
  let repaired = text;

  if (counts.openBrackets > counts.closeBrackets) {
    repaired += ']'.repeat(counts.openBrackets - counts.closeBrackets);
  }
  if (counts.openBraces > counts.closeBraces) {
    repaired += '}'.repeat(counts.openBraces - counts.closeBraces);
  }
  if (counts.quotes % 2 !== 0) {
    repaired += '"';
  }

  return repaired;
}

/**
 * Check that text is a single object with matched braces and brackets and no
 * unterminated string. Says nothing about whether JSON.parse will accept it.
 */
export function isBalancedJsonObject(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') || !trimmed.endsWith('}')) {
    return false;
  }

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (const char of trimmed) {
    if (escaped) {
      escaped = false;
      continue;
    }
    if (char === '\\') {
      escaped = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === '{' || char === '[') {
      stack.push(char);
    } else if (char === '}') {
      if (stack.pop() !== '{') return false;
    } else if (char === ']') {
      if (stack.pop() !== '[') return false;
    }
  }

  return stack.length === 0 && !inString;
}

/**
 * Extract and repair the JSON object in a reply. A reply cut off before its
 * closing brace is repaired from the first `{` to the end. Returns the
 * trimmed, fence-stripped text unchanged when there is no `{` at all.
 */
export function extractJsonObject(reply: string): string {
  const content = stripCodeFence(reply);

  const start = content.indexOf('{');
  if (start === -1) {
    return content;
  }

  const end = content.lastIndexOf('}');
  const span = end > start ? content.slice(start, end + 1) : content.slice(start);
  return repairJson(span);
}

/**
 * Extract, repair and validate. Throws a MALFORMED_RESPONSE error when the
 * reply cannot be turned into a balanced object.
 */
export function normalizeModelReply(reply: string): string {
  const json = extractJsonObject(reply);

  if (!isBalancedJsonObject(json)) {
    const preview = json.length > 200 ? `${json.slice(0, 200)}...` : json;
    throw errors.malformedResponse(`reply is not a complete JSON object: ${preview}`);
  }

  return json;
}
