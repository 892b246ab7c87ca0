import { z } from 'zod';

export const DEFAULT_DEADLINE_MS = 900_000;
export const MIN_DEADLINE_MS = 10_000;

const Port = z.number().int().min(1).max(65_535);
const EnvName = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'must be a valid environment variable name' });

export const ImageConfigSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z0-9][a-z0-9._\/:-]*$/, { message: 'must be a lowercase image repository name' })
    .default('pdf-parser-api'),
  tag: z
    .string()
    .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, { message: 'must be a valid image tag' })
    .default('light'),
  context: z.string().min(1).default('.'),
  dockerfile: z.string().min(1).optional(),
});

export const ContainerConfigSchema = z.object({
  name: z
    .string()
    .regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]+$/, { message: 'must be a valid container name' })
    .default('pdf-parser-test'),
  hostPort: Port.default(8000),
  containerPort: Port.default(8000),
  env: z.record(EnvName, z.string()).default({}),
  passEnv: z.array(EnvName).default(['ANTHROPIC_API_KEY']),
});

export const HealthConfigSchema = z.object({
  host: z.string().min(1).default('localhost'),
  path: z.string().min(1).default('/'),
  docsPath: z.string().min(1).default('/docs'),
  maxAttempts: z.number().int().min(1).max(1_000).default(5),
  intervalMs: z.number().int().nonnegative().default(2_000),
  requestTimeoutMs: z.number().int().positive().default(2_000),
  /** Grace period between launch and the first probe. */
  startupDelayMs: z.number().int().nonnegative().default(3_000),
});

export const SizeConfigSchema = z.object({
  thresholdMb: z.number().positive().default(1_000),
  /** Size of the heavier image the savings note compares against. */
  referenceMb: z.number().positive().default(3_500),
});

export const HarnessConfigSchema = z.object({
  /** Docker-compatible CLI used for every runtime call. */
  runtime: z.string().min(1).default('docker'),
  image: ImageConfigSchema.default({}),
  container: ContainerConfigSchema.default({}),
  health: HealthConfigSchema.default({}),
  size: SizeConfigSchema.default({}),
  resources: z.object({ settleDelayMs: z.number().int().nonnegative().default(2_000) }).default({}),
  report: z.object({ historyLimit: z.number().int().nonnegative().default(15) }).default({}),
  deadlineMs: z.number().int().min(MIN_DEADLINE_MS).default(DEFAULT_DEADLINE_MS),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof HarnessConfigSchema>;
