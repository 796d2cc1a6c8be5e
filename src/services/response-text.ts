// Best-effort plain-text extraction across the response shapes the platforms return.

type JsonObject = Record<string, unknown>;

export type ExtractionStrategy = (data: JsonObject) => string | undefined;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Responses API convenience field. */
export const outputTextStrategy: ExtractionStrategy = (data) => nonEmpty(data.output_text);

/** Responses API `output[]` message items. */
export const responseOutputStrategy: ExtractionStrategy = (data) => {
  if (!Array.isArray(data.output)) return undefined;
  const texts: string[] = [];
  for (const item of data.output) {
    if (!isObject(item) || item.type !== 'message' || !Array.isArray(item.content)) continue;
    for (const part of item.content) {
      const text = isObject(part) ? nonEmpty(part.text) : undefined;
      if (text) texts.push(text);
    }
  }
  return nonEmpty(texts.join(''));
};

/** Chat Completions `choices[0].message.content`. */
export const chatChoiceStrategy: ExtractionStrategy = (data) => {
  if (!Array.isArray(data.choices) || data.choices.length === 0) return undefined;
  const first: unknown = data.choices[0];
  if (!isObject(first) || !isObject(first.message)) return undefined;
  return nonEmpty(first.message.content);
};

/** Messages API `content[]` blocks. */
export const contentListStrategy: ExtractionStrategy = (data) => {
  if (!Array.isArray(data.content)) return undefined;
  const texts = data.content.filter(isObject).map((part) => (typeof part.text === 'string' ? part.text : ''));
  return nonEmpty(texts.join(''));
};

export const DEFAULT_EXTRACTION_STRATEGIES: readonly ExtractionStrategy[] = [
  outputTextStrategy,
  responseOutputStrategy,
  chatChoiceStrategy,
  contentListStrategy,
];

/**
 * Apply the strategies in order; the raw text is returned unchanged when it
 * is not a JSON object or when no strategy yields text.
 */
export function extractResponseText(
  raw: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_EXTRACTION_STRATEGIES
): string {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return raw;
  }
  if (!isObject(data)) return raw;

  for (const strategy of strategies) {
    const text = strategy(data);
    if (text !== undefined) return text;
  }
  return raw;
}
