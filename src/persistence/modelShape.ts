import { z } from "zod";
import { ModelFormatError } from "../errors";

const PARAMETRIZED_TAGS: readonly string[] = ["leaky_relu", "elu"];

/**
 * One persisted layer. `activation` is kept as a free string here so that an
 * unknown tag surfaces as `UnknownActivationError` when it is resolved, not
 * as a generic format error.
 */
const layerRecordSchema = z
  .object({
    weights: z
      .array(z.array(z.number()).min(1))
      .min(1)
      .refine(
        (rows) => rows.every((row) => row.length === rows[0]?.length),
        "Weights must be a rectangular matrix",
      ),
    biases: z.array(z.number()),
    activation: z.string().min(1),
    alpha: z.number().positive().finite().optional(),
  })
  .refine((rec) => rec.biases.length === rec.weights.length, {
    message: "Biases length must equal the number of weight rows",
  })
  .refine(
    (rec) => rec.alpha === undefined || PARAMETRIZED_TAGS.includes(rec.activation.toLowerCase()),
    { message: "alpha is only allowed for leaky_relu and elu", path: ["alpha"] },
  );

export type LayerRecord = z.infer<typeof layerRecordSchema>;

const persistedModelSchema = z.object({
  layers: z.array(layerRecordSchema).min(1),
});

export type PersistedModel = z.infer<typeof persistedModelSchema>;

/** Validate an already-decoded JSON value as a persisted model. */
export function parsePersistedModel(input: unknown): PersistedModel {
  const result = persistedModelSchema.safeParse(input);
  if (!result.success) {
    const msgs = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ModelFormatError(`Invalid model: ${msgs.join("; ")}`);
  }
  return result.data;
}
