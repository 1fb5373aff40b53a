import fs from 'fs-extra';
import { z } from 'zod';

import { errorMessage } from '../errors.js';
import { toPosixRelative } from '../io.js';
import { PARAMETER_REPS } from '../param_resolver.js';

export const AuthorConfigSchema = z.object({
  placeholderPattern: z.string().min(1).default('\\{\\{.+?\\}\\}'),
  governedHeading: z.string().min(1).optional(),
  validateHeader: z.boolean().default(true),
  validateBody: z.boolean().default(true),
  templateVersion: z.boolean().default(false),
  setParameters: z.boolean().default(false),
  overwriteHeaderValues: z.boolean().default(false),
  paramRep: z.enum(PARAMETER_REPS).default('raw'),
  valueSeparator: z.string().default(', '),
  version: z.string().min(1).optional()
});

export type AuthorConfig = z.infer<typeof AuthorConfigSchema>;

function parseConfig(raw: unknown, source: string): AuthorConfig {
  const result = AuthorConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`${source} is not a valid author config: ${details}`);
  }
  return result.data;
}

export function defaultAuthorConfig(): AuthorConfig {
  return parseConfig({}, 'default config');
}

export async function loadAuthorConfig(configPath?: string): Promise<AuthorConfig> {
  if (!configPath) {
    return defaultAuthorConfig();
  }

  if (!(await fs.pathExists(configPath))) {
    throw new Error(`Config file not found: ${toPosixRelative(configPath)}`);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new Error(`${toPosixRelative(configPath)} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseConfig(raw, toPosixRelative(configPath));
}

export function parseBooleanOption(value: string, optionName: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'false' || normalized === 'no') {
    return false;
  }
  throw new Error(`Option '--${optionName}' expects true|false, got '${value}'`);
}

const BOOLEAN_OPTIONS = {
  'validate-header': 'validateHeader',
  'validate-body': 'validateBody',
  'template-version': 'templateVersion',
  'set-parameters': 'setParameters',
  'overwrite-header-values': 'overwriteHeaderValues'
} as const;

const STRING_OPTIONS = {
  'placeholder-pattern': 'placeholderPattern',
  'governed-heading': 'governedHeading',
  'param-rep': 'paramRep',
  'value-separator': 'valueSeparator',
  version: 'version'
} as const;

export const CONFIG_OPTION_NAMES: readonly string[] = [
  ...Object.keys(BOOLEAN_OPTIONS),
  ...Object.keys(STRING_OPTIONS)
];

/** Layers `--key value` CLI options over a loaded config and re-validates the result. */
export function applyCliOverrides(config: AuthorConfig, options: Map<string, string>): AuthorConfig {
  const next: Record<string, unknown> = { ...config };

  for (const [option, field] of Object.entries(BOOLEAN_OPTIONS)) {
    const value = options.get(option);
    if (value !== undefined) {
      next[field] = parseBooleanOption(value, option);
    }
  }

  for (const [option, field] of Object.entries(STRING_OPTIONS)) {
    const value = options.get(option);
    if (value !== undefined) {
      next[field] = value;
    }
  }

  return parseConfig(next, 'command line options');
}
