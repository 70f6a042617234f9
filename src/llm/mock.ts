import { InputError, type QueryClient, type QueryOptions, type QueryResult } from "./base";

// Capitalised words that do not open a sentence or line, minus single letters like "I".
function rudimentaryEntities(text: string) {
  const entities: Array<{ text: string; type: string }> = [];
  const seen = new Set<string>();
  const pattern = /(^|[.!?]\s+|\s)([A-Z][\p{L}'-]+)/gu;
  for (const match of text.matchAll(pattern)) {
    const [, lead, word] = match;
    const sentenceStart = match.index === 0 || /[.!?\n]/.test(lead);
    if (sentenceStart || seen.has(word)) continue;
    seen.add(word);
    entities.push({ text: word, type: "MISC" });
  }
  return entities;
}

/**
 * Offline stand-in used by the `mock` provider. Answers every prompt with an
 * entity list guessed from capitalisation.
 */
export class MockQueryClient implements QueryClient {
  async query(prompt: string, _options: QueryOptions): Promise<QueryResult> {
    if (!prompt.trim()) {
      return { ok: false, error: new InputError("Prompt must not be empty") };
    }
    const text = JSON.stringify({ entities: rudimentaryEntities(prompt) });
    return { ok: true, text, raw: { provider: "mock" } };
  }
}
