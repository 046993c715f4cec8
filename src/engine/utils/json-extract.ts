/**
 * Pull a JSON object out of model output that may be wrapped in prose or
 * markdown fences.
 *
 * Tried in order: the trimmed text as-is, a ```json fence, a bare ``` fence
 * holding an object, then the outermost `{...}` span.
 */

const JSON_FENCE = /```json\s*([\s\S]*?)```/;
const BARE_FENCE = /```\s*([\s\S]*?)```/;

export function extractJsonCandidate(content: string): string | undefined {
  const trimmed = content.trim();
  if (trimmed.startsWith('{')) return trimmed;

  const jsonFence = JSON_FENCE.exec(trimmed);
  if (jsonFence) return jsonFence[1].trim();

  const bareFence = BARE_FENCE.exec(trimmed);
  if (bareFence && bareFence[1].trim().startsWith('{')) return bareFence[1].trim();

  const first = trimmed.indexOf('{');
  const last = trimmed.lastIndexOf('}');
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1);

  return undefined;
}

/**
 * Parse the first JSON object found in `content`. Throws SyntaxError when
 * there is none or it does not parse.
 */
export function parseJsonFromContent(content: string): unknown {
  const candidate = extractJsonCandidate(content);
  if (candidate === undefined) {
    throw new SyntaxError('No JSON object found in response');
  }
  return JSON.parse(candidate);
}
