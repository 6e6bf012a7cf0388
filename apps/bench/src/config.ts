import { z } from "zod";
import { isScenarioName, SCENARIO_ORDER } from "@pathweave/config";

const configSchema = z.object({
  BENCH_SEED: z.coerce.number().int().nonnegative().default(42),
  BENCH_ITERATIONS: z.coerce.number().int().positive().default(5),
  BENCH_GRID_SIZE: z.coerce.number().int().min(2).default(30), // grid side length
  BENCH_RANDOM_NODES: z.coerce.number().int().min(2).default(150),
  BENCH_EDGE_FACTOR: z.coerce.number().int().positive().default(4), // edges per node in random graphs
  BENCH_SCENARIOS: z
    .string()
    .default(SCENARIO_ORDER.join(","))
    .transform((value) =>
      value
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .refine((names) => names.length > 0 && names.every(isScenarioName), {
      message: `BENCH_SCENARIOS must be a comma-separated list of: ${SCENARIO_ORDER.join(", ")}`
    })
    .transform((names) => names.filter(isScenarioName)),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new Error(`Configuration validation failed:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}
