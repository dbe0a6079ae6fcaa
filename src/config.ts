import { readFile } from 'node:fs/promises';
import { z } from 'zod';

import { ConfigurationError } from './utils/errors';
import { LOG_LEVELS } from './utils/logger';

export const normalizationSchema = z.object({
  mean: z.number().finite().default(0),
  scale: z
    .number()
    .finite()
    .refine((value) => value !== 0, { message: 'scale must not be zero' })
    .default(255),
});

export const pipelineConfigSchema = z.object({
  modelPath: z.string().min(1),
  labelsPath: z.string().min(1).optional(),
  normalization: normalizationSchema.default({}),
  // consecutive shape mismatches before they are reported as a configuration problem
  structuralMismatchThreshold: z.number().int().positive().default(3),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export const DEFAULT_NORMALIZATION = normalizationSchema.parse({});

const ENV_PREFIX = 'FRAME_CLASSIFIER_';

const numberFromEnv = z.coerce.number();
const integerFromEnv = z.coerce.number().int();

const formatIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const parseConfig = (input: unknown): PipelineConfig => {
  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid pipeline configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
};

/**
 * Builds the configuration from FRAME_CLASSIFIER_* variables. Unset variables fall
 * back to the schema defaults.
 */
export const loadConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): PipelineConfig => {
  const read = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const envSchema = z.object({
    modelPath: z.string().optional(),
    labelsPath: z.string().optional(),
    mean: numberFromEnv.optional(),
    scale: numberFromEnv.optional(),
    structuralMismatchThreshold: integerFromEnv.optional(),
    logLevel: z.string().optional(),
  });

  const raw = envSchema.safeParse({
    modelPath: read('MODEL_PATH'),
    labelsPath: read('LABELS_PATH'),
    mean: read('NORMALIZE_MEAN'),
    scale: read('NORMALIZE_SCALE'),
    structuralMismatchThreshold: read('STRUCTURAL_MISMATCH_THRESHOLD'),
    logLevel: read('LOG_LEVEL'),
  });
  if (!raw.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(raw.error)}`);
  }

  const { mean, scale, ...rest } = raw.data;
  return parseConfig({ ...rest, normalization: { mean, scale } });
};

const labelsSchema = z.array(z.string());

/** Reads a JSON array of label names, index i naming output score i. */
export const readLabels = async (labelsPath: string): Promise<string[]> => {
  let text: string;
  try {
    text = await readFile(labelsPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read labels file ${labelsPath}`, { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Labels file ${labelsPath} is not valid JSON`, { cause: error });
  }

  const result = labelsSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigurationError(`Labels file ${labelsPath} must be an array of strings`);
  }
  return result.data;
};
