import { z } from "zod";
import { ConfigError } from "./errors";

const runConfigSchema = z.object({
  epochs: z.number().int().positive(),
  learningRate: z.number().positive(),
  batchSize: z.number().int().positive(),
  hidden: z.number().int().positive(),
  seed: z.number().int().nonnegative().optional(),
  modelPath: z.string().min(1),
  logEvery: z.number().int().positive(),
});

/** Configuration for the XOR demo run. */
export type RunConfig = z.infer<typeof runConfigSchema>;

/**
 * Read the run configuration from `--name=value` arguments and environment
 * variables. CLI arguments take precedence over environment variables.
 *
 * @example
 * // CLI usage: node dist/src/main.js --epochs=2000 --lr=0.05 --seed=7
 * // Environment: EPOCHS=2000 LR=0.05 SEED=7 node dist/src/main.js
 */
export function parseConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const getArg = (name: string): string | undefined => {
    const p = argv.find((a) => a.startsWith(`--${name}=`));
    return p ? p.slice(name.length + 3) : undefined;
  };

  const seed = getArg("seed") ?? env.SEED;
  const raw = {
    epochs: Number(getArg("epochs") ?? env.EPOCHS ?? 1000),
    learningRate: Number(getArg("lr") ?? env.LR ?? 0.1),
    batchSize: Number(getArg("batchSize") ?? env.BATCH_SIZE ?? 4),
    hidden: Number(getArg("hidden") ?? env.HIDDEN ?? 4),
    ...(seed !== undefined ? { seed: Number(seed) } : {}),
    modelPath: getArg("model") ?? env.MODEL_PATH ?? "model.json",
    logEvery: Number(getArg("logEvery") ?? env.LOG_EVERY ?? 100),
  };

  const result = runConfigSchema.safeParse(raw);
  if (!result.success) {
    const msgs = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${msgs.join("; ")}`);
  }
  return result.data;
}
