import { z } from "zod";

export const entitySchema = z
  .object({
    text: z.string(),
    type: z.string(),
  })
  .passthrough();

export type Entity = z.infer<typeof entitySchema>;

const entityListSchema = z.object({
  entities: z.array(entitySchema),
});

export type EntityParseResult =
  | { kind: "ok"; entities: Entity[] }
  | { kind: "decode_error"; raw: string; message: string }
  | { kind: "shape_error"; raw: string; message: string };

/**
 * Reads model output expected to look like `{"entities": [...]}`.
 * Text that is not JSON and JSON of the wrong shape are reported
 * separately; neither throws.
 */
export function parseEntityList(raw: string): EntityParseResult {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { kind: "decode_error", raw, message };
  }

  const parsed = entityListSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? issue.path.join(".") : "entities";
    return { kind: "shape_error", raw, message: `${where}: ${issue?.message ?? "invalid value"}` };
  }
  return { kind: "ok", entities: parsed.data.entities };
}
