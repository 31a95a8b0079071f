import { z } from 'zod';

const proportion = z.number().min(0).max(1);

export const InitialProportionsSchema = z.object({
  white: proportion.describe('Initial white daisy proportion'),
  black: proportion.describe('Initial black daisy proportion'),
  gray: proportion.optional().describe('Initial gray daisy proportion (enables gray daisies)'),
}).strict().refine(
  (p) => p.white + p.black + (p.gray ?? 0) <= 1,
  { message: 'Initial proportions must sum to at most 1' },
);

export const SpeciesEnabledSchema = z.object({
  white: z.boolean().optional(),
  black: z.boolean().optional(),
  gray: z.boolean().optional(),
}).strict();

export const PlanetConfigSchema = z.object({
  proportions: InitialProportionsSchema,
  luminosity: z.number().positive().describe('Dimensionless solar luminosity (1 = baseline)'),
  roundWorld: z.boolean().default(false).describe('Start latitude-resolved'),
  growthEnabled: z.boolean().default(true).describe('Daisies grow and die on update'),
  enabled: SpeciesEnabledSchema.default({}).describe('Per-species overrides of the enabled flag'),
}).strict();

export const EngineConfigSchema = z.object({
  stepsPerTick: z.number().int().min(1).max(10000).describe('Planet updates per wall-clock tick (1-10000)'),
  realTickIntervalMs: z.number().int().min(10).max(60000).describe('Wall-clock interval between ticks (10-60000 ms)'),
}).strict();

export const RecordingConfigSchema = z.object({
  enabled: z.boolean().describe('Record tabular data while the server runs'),
  dir: z.string().min(1).describe('Output directory for CSV files (non-empty)'),
  intervalSteps: z.number().int().min(1).describe('Steps between recorded rows (>= 1)'),
  flushIntervalSteps: z.number().int().min(1).describe('Steps between appends of recorded rows to the CSV file (>= 1)'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
  metricsIntervalSteps: z.number().int().min(1).describe('Steps between planet metrics log lines'),
  recording: RecordingConfigSchema,
}).strict();

export const AppConfigSchema = z.object({
  planet: PlanetConfigSchema,
  engine: EngineConfigSchema,
  runtime: RuntimeConfigSchema,
}).strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  updatesPerTimeUnit: number;
  simTimePerTick: number;
  ticksPerSecond: number;
  /** Simulated time units per real second */
  acceleration: number;
}

export interface ValidatedConfig {
  planet: AppConfig['planet'];
  engine: AppConfig['engine'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
