/**
 * Config - Resolves and validates the run configuration
 *
 * PURPOSE
 * ───────
 * Turns command-line flags and environment variables into one
 * PdfOutlineConfig, once, at startup. Nothing downstream reads process.env.
 *
 * PRECEDENCE
 * ──────────
 * flag  >  environment variable  >  default
 *
 * - Unknown flags are a ConfigurationError (parseArgs strict mode)
 * - Numeric values out of range are clamped, unparsable ones fall back to defaults
 *
 * USAGE
 * ─────
 * ```typescript
 * const config = resolveConfig(process.argv.slice(2), process.env);
 * await processDirectory(config);
 * ```
 */

import { parseArgs } from 'node:util';

import { ConfigurationError } from '../errors';
import { DEFAULT_CONFIG, ENV_INPUT_DIR, ENV_OUTPUT_DIR, ENV_PROFILE_PAGES, type PdfOutlineConfig } from '../types';

/**
 * Validation limits for numeric settings
 */
const LIMITS = {
  profilePages: { min: 1, max: 500 }
} as const;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Parses an integer (number or numeric string) and clamps it to the range
 */
function validateInteger(value: unknown, defaultValue: number, min: number, max: number): number {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof n !== 'number' || !Number.isFinite(n)) {
    return defaultValue;
  }
  return clamp(Math.floor(n), min, max);
}

function validateBoolean(value: unknown, defaultValue: boolean): boolean {
  if (typeof value === 'boolean') return value;
  return defaultValue;
}

/**
 * Non-empty, trimmed string, otherwise the default
 */
function validatePath(value: unknown, defaultValue: string): string {
  if (typeof value === 'string' && value.trim() !== '') return value.trim();
  return defaultValue;
}

/**
 * Validates a partial config and applies defaults
 */
export function validateConfig(partial: Partial<Record<keyof PdfOutlineConfig, unknown>> | null | undefined): PdfOutlineConfig {
  if (!partial || typeof partial !== 'object') {
    return { ...DEFAULT_CONFIG };
  }

  return {
    inputDir: validatePath(partial.inputDir, DEFAULT_CONFIG.inputDir),
    outputDir: validatePath(partial.outputDir, DEFAULT_CONFIG.outputDir),
    profilePages: validateInteger(
      partial.profilePages,
      DEFAULT_CONFIG.profilePages,
      LIMITS.profilePages.min,
      LIMITS.profilePages.max
    ),
    help: validateBoolean(partial.help, DEFAULT_CONFIG.help)
  };
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        input: { type: 'string', short: 'i' },
        output: { type: 'string', short: 'o' },
        'profile-pages': { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      },
      allowPositionals: false,
      strict: true
    }).values;
  } catch (err) {
    throw new ConfigurationError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Resolves the configuration from CLI flags and the environment
 *
 * @param argv - Arguments after the script name
 * @param env - Usually process.env
 * @throws ConfigurationError on unknown flags or missing flag values
 */
export function resolveConfig(argv: readonly string[], env: NodeJS.ProcessEnv): PdfOutlineConfig {
  const flags = parseFlags(argv);

  return validateConfig({
    inputDir: flags.input ?? env[ENV_INPUT_DIR],
    outputDir: flags.output ?? env[ENV_OUTPUT_DIR],
    profilePages: flags['profile-pages'] ?? env[ENV_PROFILE_PAGES],
    help: flags.help ?? false
  });
}

export const USAGE = `
pdf-outline - Infer title and H1-H4 headings from PDF layout

Usage: pdf-outline [options]

Options:
  -i, --input <dir>          Directory of PDF files (env ${ENV_INPUT_DIR}, default: ${DEFAULT_CONFIG.inputDir})
  -o, --output <dir>         Directory for JSON outlines (env ${ENV_OUTPUT_DIR}, default: ${DEFAULT_CONFIG.outputDir})
  --profile-pages <n>        Pages sampled for font statistics (env ${ENV_PROFILE_PAGES}, default: ${DEFAULT_CONFIG.profilePages})
  -h, --help                 Show this help message
`;
