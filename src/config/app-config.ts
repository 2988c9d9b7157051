/**
 * Library configuration - parse, don't validate.
 *
 * - Single source of truth for the config surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import { DEFAULT_MAX_STACK_DEPTH } from '../backtrace/capture.js';
import { DEFAULT_SYMBOL_BUFFER_SIZE } from '../backtrace/symbol.js';
import type { FatalSignal } from '../signals/fatal-signals.js';
import { FATAL_SIGNALS, isFatalSignal } from '../signals/fatal-signals.js';

// =============================================================================
// Branded primitives (prove parsing/validation happened)
// =============================================================================

export type MaxFrameDepth = Brand<number, 'MaxFrameDepth'>;
export type SymbolBufferSize = Brand<number, 'SymbolBufferSize'>;

export interface AppConfig {
  readonly backtrace: {
    readonly maxDepth: MaxFrameDepth;
    readonly symbolBufferSize: SymbolBufferSize;
  };
  readonly signals: {
    readonly install: readonly FatalSignal[];
  };
}

export type ValidatedConfig = ValidatedAppConfig<AppConfig>;

export interface LoadConfigOptions {
  readonly env: Record<string, string | undefined>;
}

// =============================================================================
// Schema (single source of truth for validation + types)
// =============================================================================

const EnvSchema = z.object({
  FAULTLINE_MAX_FRAMES: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('FAULTLINE_MAX_FRAMES must be an integer')
        .min(1, 'FAULTLINE_MAX_FRAMES must be >= 1')
        .max(256, 'FAULTLINE_MAX_FRAMES cannot exceed 256')
        .default(DEFAULT_MAX_STACK_DEPTH)
    ),

  FAULTLINE_SYMBOL_BUFFER_SIZE: z
    .string()
    .optional()
    .transform((v) => (v === undefined ? undefined : Number(v)))
    .pipe(
      z
        .number()
        .int('FAULTLINE_SYMBOL_BUFFER_SIZE must be an integer')
        .min(16, 'FAULTLINE_SYMBOL_BUFFER_SIZE must be >= 16')
        .max(8192, 'FAULTLINE_SYMBOL_BUFFER_SIZE cannot exceed 8192')
        .default(DEFAULT_SYMBOL_BUFFER_SIZE)
    ),

  FAULTLINE_SIGNALS: z
    .string()
    .optional()
    .transform((v) =>
      v === undefined
        ? [...FATAL_SIGNALS]
        : v.split(',').map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0)
    )
    .pipe(
      z
        .array(
          z.string().refine(isFatalSignal, (s) => ({ message: `${s} is not one of ${FATAL_SIGNALS.join(', ')}` }))
        )
        .min(1, 'FAULTLINE_SIGNALS must name at least one signal')
    ),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadConfigResult = Result<ValidatedConfig, ConfigInvalidError>;

export function loadConfig(options: LoadConfigOptions): LoadConfigResult {
  const parsed = EnvSchema.safeParse(options.env);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  return ok(buildConfig(parsed.data) as ValidatedConfig);
}

// =============================================================================
// Internal
// =============================================================================

function buildConfig(env: ParsedEnv): AppConfig {
  return {
    backtrace: {
      maxDepth: env.FAULTLINE_MAX_FRAMES as MaxFrameDepth,
      symbolBufferSize: env.FAULTLINE_SYMBOL_BUFFER_SIZE as SymbolBufferSize,
    },
    signals: {
      install: [...new Set(env.FAULTLINE_SIGNALS)],
    },
  };
}

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
