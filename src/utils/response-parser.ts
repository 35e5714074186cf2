/**
 * Response Parser
 * Pulls structured values out of free-text oracle responses
 */

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract a JSON array from a response
 * Tries the outermost [...] span first, then the whole response
 * @returns The parsed array, or null when nothing parses as an array
 */
export function extractJsonArray(response: string): unknown[] | null {
  const match = response.match(/\[[\s\S]*\]/);
  if (match) {
    const parsed = tryParseJson(match[0]);
    if (Array.isArray(parsed)) return parsed;
  }

  const whole = tryParseJson(response.trim());
  return Array.isArray(whole) ? whole : null;
}

/**
 * Extract a single JSON object from a response
 * @returns The parsed object, or null when no {...} span parses as an object
 */
export function extractJsonObject(response: string): Record<string, unknown> | null {
  const match = response.match(/\{[\s\S]*\}/);
  if (!match) return null;

  const parsed = tryParseJson(match[0]);
  return isRecord(parsed) ? parsed : null;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Scan a response line by line for URL-shaped tokens (first one per line)
 * Trailing markdown / sentence punctuation is stripped from each token
 */
export function extractUrls(response: string): string[] {
  const urls: string[] = [];

  for (const rawLine of response.split(/\r?\n/)) {
    const match = rawLine.match(/https?:\/\/[^\s<>"'`]+/);
    if (!match) continue;

    const url = match[0].replace(/[)\],.;:!?*]+$/, '');
    if (url.length > 'https://'.length) {
      urls.push(url);
    }
  }

  return urls;
}

/**
 * Read a field as a trimmed string
 * Numbers are accepted and stringified; anything else yields undefined
 */
export function readText(record: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string') return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  }
  return undefined;
}
