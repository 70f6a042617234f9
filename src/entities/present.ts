import type { EntityParseResult } from "./parse";

export const RETRY_SUGGESTION = "Try running the extraction again with a lower temperature.";

export function formatEntityReport(result: EntityParseResult): string[] {
  switch (result.kind) {
    case "ok":
      if (!result.entities.length) {
        return ["No entities found."];
      }
      return [
        `Found ${result.entities.length} ${result.entities.length === 1 ? "entity" : "entities"}:`,
        ...result.entities.map((entity, index) => `${index + 1}. ${entity.text} (${entity.type})`),
      ];
    case "decode_error":
      return [
        `Could not decode the model output as JSON: ${result.message}`,
        "Raw output:",
        result.raw,
        RETRY_SUGGESTION,
      ];
    case "shape_error":
      return [
        `Model output is JSON but has no usable "entities" list (${result.message})`,
        "Raw output:",
        result.raw,
        RETRY_SUGGESTION,
      ];
  }
}
