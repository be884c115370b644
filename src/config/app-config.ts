/**
 * Setup options - parse, don't validate.
 *
 * - Single source of truth for the option surface
 * - Zod validates at the boundary and returns typed data
 * - Errors are data (Result), never thrown
 */

import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import { Err } from '../errors/factories.js';
import type { ConfigInvalidError, ConfigIssue, ValidatedAppConfig } from '../errors/app-error.js';
import type { ColumnSpec } from '../ports/view-renderer.port.js';
import type { FloatBorder, WindowOptionValue } from '../ports/host.port.js';

export const FILES_ADAPTER = 'files';
export const DEFAULT_SCHEME = 'burrow://';
/** Filetype that marks a buffer as an engine directory view */
export const ENGINE_FILETYPE = 'burrow';
export const COMMAND_NAME = 'Burrow';

export interface FloatConfig {
  readonly padding: number;
  readonly maxWidth: number;
  readonly maxHeight: number;
  readonly border: FloatBorder;
  readonly winOptions: Readonly<Record<string, WindowOptionValue>>;
}

export interface SetupConfig {
  /** scheme → adapter name */
  readonly adapters: Readonly<Record<string, string>>;
  /** alias scheme → target scheme */
  readonly adapterAliases: Readonly<Record<string, string>>;
  readonly columns: readonly ColumnSpec[];
  readonly winOptions: Readonly<Record<string, WindowOptionValue>>;
  readonly restoreWinOptions: boolean;
  readonly float: FloatConfig;
  readonly silenceScpWarning: boolean;
}

export type ValidatedSetupConfig = ValidatedAppConfig<SetupConfig>;

// =============================================================================
// Schema
// =============================================================================

const SchemeSchema = z.string().regex(/^[A-Za-z][A-Za-z0-9+.-]*:\/\/$/, 'scheme must look like "name://"');

const WindowOptionValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const WindowOptionsSchema = z.record(z.string(), WindowOptionValueSchema);

const ColumnSpecSchema = z.union([z.string().min(1), z.object({ name: z.string().min(1) }).passthrough()]);

const FloatSchema = z
  .object({
    padding: z.number().int().min(0, 'float.padding cannot be negative').default(2),
    maxWidth: z.number().int().min(0).default(0),
    maxHeight: z.number().int().min(0).default(0),
    border: z.enum(['none', 'single', 'double', 'rounded', 'solid', 'shadow']).default('rounded'),
    winOptions: WindowOptionsSchema.default({ winblend: 10 }),
  })
  .default({});

const SetupOptionsSchema = z
  .object({
    adapters: z.record(SchemeSchema, z.string().min(1)).default({ [DEFAULT_SCHEME]: FILES_ADAPTER }),
    adapterAliases: z.record(SchemeSchema, SchemeSchema).default({}),
    columns: z.array(ColumnSpecSchema).default([]),
    winOptions: WindowOptionsSchema.default({
      wrap: false,
      signcolumn: 'no',
      cursorcolumn: false,
      foldcolumn: '0',
      spell: false,
      list: false,
      conceallevel: 3,
      concealcursor: 'n',
    }),
    restoreWinOptions: z.boolean().default(true),
    float: FloatSchema,
    silenceScpWarning: z.boolean().default(false),
  })
  .strict()
  .default({});

export type SetupOptions = z.input<typeof SetupOptionsSchema>;

// =============================================================================
// Public API
// =============================================================================

export type LoadSetupConfigResult = Result<ValidatedSetupConfig, ConfigInvalidError>;

export function loadSetupConfig(options: unknown): LoadSetupConfigResult {
  const parsed = SetupOptionsSchema.safeParse(options);

  if (!parsed.success) {
    return err(Err.configInvalid(toConfigIssues(parsed.error)));
  }

  if (Object.keys(parsed.data.adapters).length === 0) {
    return err(Err.configInvalid([{ path: 'adapters', message: 'at least one scheme must be registered' }]));
  }

  const config: SetupConfig = parsed.data;
  return ok(config as ValidatedSetupConfig);
}

// =============================================================================
// Internal
// =============================================================================

function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
