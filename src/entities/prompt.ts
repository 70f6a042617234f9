export const DEFAULT_EXTRACTION_SYSTEM_PROMPT = `You are a named entity recognition system.
Find every named entity in the text the user sends.
Answer with a single JSON object and nothing else, shaped as
{"entities": [{"text": "<entity as written>", "type": "<TYPE>"}]}.
Use types such as PERSON, LOCATION, ORGANIZATION, DATE, EVENT, PRODUCT.
List entities in the order they appear. Return {"entities": []} when there are none.`;

export const DEFAULT_EXTRACTION_TEMPLATE = `Text:
{{text}}`;

const TEXT_PLACEHOLDER = /\{\{\s*text\s*\}\}/g;

/**
 * Fills every `{{text}}` in `template` with the trimmed input. Other
 * placeholders are left as written. Blank input yields a blank prompt so the
 * client rejects it as input.
 */
export function buildExtractionPrompt(text: string, template: string = DEFAULT_EXTRACTION_TEMPLATE): string {
  if (!template.match(TEXT_PLACEHOLDER)) {
    throw new Error("Extraction template must contain a {{text}} placeholder");
  }
  const trimmed = text.trim();
  if (!trimmed) return "";
  return template.replace(TEXT_PLACEHOLDER, () => trimmed);
}
