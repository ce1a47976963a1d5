import { z } from 'zod';

/**
 * Single-shot prediction dialect:
 * `{"Action": str, "Confidence": float, "Weather": str, "Time": str, "Road": str}`
 *
 * Key names are case-sensitive. Confidence may arrive as a number or a
 * numeric string; its range is checked by the field validators.
 */
export const predictionJsonSchema = z.object({
  Action: z.string(),
  Confidence: z.union([z.number(), z.string()]),
  Weather: z.string(),
  Time: z.string(),
  Road: z.string(),
});

export const sceneContextSchema = z.object({
  weather: z.string(),
  time: z.string(),
  road: z.string(),
});

/**
 * Scene analysis dialect. `objects` is optional; its entries are checked
 * one by one with {@link sceneObjectEntrySchema} so that a bad entry only
 * drops that entry.
 */
export const sceneJsonSchema = z.object({
  objects: z.array(z.unknown()).optional(),
  context: sceneContextSchema,
});

export const sceneObjectEntrySchema = z.object({
  type: z.string(),
  bbox: z.array(z.unknown()),
  confidence: z.union([z.number(), z.string()]),
  state: z.unknown().optional(),
  metadata: z.unknown().optional(),
});

export type PredictionJson = z.infer<typeof predictionJsonSchema>;
export type SceneJson = z.infer<typeof sceneJsonSchema>;
export type SceneObjectEntry = z.infer<typeof sceneObjectEntrySchema>;

/**
 * Describe the first schema violation as "<path>: <message>"
 */
export function describeSchemaError(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) {
    return 'schema mismatch';
  }
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}
