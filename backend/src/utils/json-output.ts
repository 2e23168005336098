/**
 * Extraction of a JSON object from free-form model output.
 *
 * Strategies run in order and the first one that yields a parseable object
 * wins. Each strategy either proposes a candidate string or declines.
 */

export type ParseResult<T> =
  | { ok: true; value: T; strategy: string }
  | { ok: false; error: string };

export interface ParseStrategy {
  name: string;
  extract(text: string): string | null;
}

const JSON_FENCE = "```json";
const FENCE = "```";

export const rawJson: ParseStrategy = {
  name: "raw",
  extract: (text) => text.trim(),
};

export const fencedJson: ParseStrategy = {
  name: "json-fence",
  extract: (text) => {
    const open = text.indexOf(JSON_FENCE);
    if (open === -1) {
      return null;
    }
    const start = open + JSON_FENCE.length;
    const end = text.indexOf(FENCE, start);
    return (end === -1 ? text.slice(start) : text.slice(start, end)).trim();
  },
};

export const unlabeledFence: ParseStrategy = {
  name: "bare-fence",
  extract: (text) => (text.includes(FENCE) ? text.split(FENCE).join("").trim() : null),
};

export const JSON_OUTPUT_STRATEGIES: readonly ParseStrategy[] = [rawJson, fencedJson, unlabeledFence];

function parseObject(candidate: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(candidate);
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return null;
  } catch {
    return null;
  }
}

export function parseJsonObject(
  text: string,
  strategies: readonly ParseStrategy[] = JSON_OUTPUT_STRATEGIES,
): ParseResult<Record<string, unknown>> {
  for (const strategy of strategies) {
    const candidate = strategy.extract(text);
    if (candidate === null || candidate === "") {
      continue;
    }
    const value = parseObject(candidate);
    if (value) {
      return { ok: true, value, strategy: strategy.name };
    }
  }

  const preview = text.length > 200 ? `${text.substring(0, 200)}...` : text;
  return { ok: false, error: `could not parse model output as JSON: ${preview}` };
}
