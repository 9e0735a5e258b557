import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { EngineConfig } from './types.js';

export const DEFAULT_BOARD_SIZE = 3;
export const DEFAULT_BASE_DEPTH = 2;
export const DEFAULT_DEPTH_GROWTH = 2;

export const MarkSchema = z.enum(['X', 'O']);

const PlayerProfileSchema = z.object({
  mark: MarkSchema,
  label: z.string().min(1),
  color: z.string().min(1),
});

export const EngineConfigSchema = z.object({
  boardSize: z.number().int().min(3).max(6),
  players: z
    .tuple([PlayerProfileSchema, PlayerProfileSchema])
    .refine(([first, second]) => first.mark === 'X' && second.mark === 'O', {
      message: 'players must list X first, then O',
    }),
  aiPlayer: MarkSchema,
  baseDepth: z.number().int().min(1),
  depthGrowth: z.number().int().min(0),
});

export const defaultConfig = (): EngineConfig => ({
  boardSize: DEFAULT_BOARD_SIZE,
  players: [
    { mark: 'X', label: 'X', color: 'blue' },
    { mark: 'O', label: 'O', color: 'green' },
  ],
  aiPlayer: 'O',
  baseDepth: DEFAULT_BASE_DEPTH,
  depthGrowth: DEFAULT_DEPTH_GROWTH,
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : 'value'}: ${issue.message}`)
    .join('; ');
}

export function validateConfig(config: EngineConfig): { ok: true } | { ok: false; reason: string } {
  const parsed = EngineConfigSchema.safeParse(config);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }
  return { ok: true };
}

export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse({ ...defaultConfig(), ...overrides });
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  return parsed.data;
}

const blankToUndefined = (value: unknown) => (value === undefined || value === '' ? undefined : value);

const EnvSchema = z.object({
  ENGINE_BOARD_SIZE: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
  ENGINE_AI_PLAYER: z.preprocess(blankToUndefined, MarkSchema.optional()),
  ENGINE_BASE_DEPTH: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
  ENGINE_DEPTH_GROWTH: z.preprocess(blankToUndefined, z.coerce.number().int().optional()),
});

/**
 * Builds a config from `ENGINE_*` variables. Unset or blank variables keep
 * their defaults.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  const vars = parsed.data;
  const overrides: Partial<EngineConfig> = {};
  if (vars.ENGINE_BOARD_SIZE !== undefined) overrides.boardSize = vars.ENGINE_BOARD_SIZE;
  if (vars.ENGINE_AI_PLAYER !== undefined) overrides.aiPlayer = vars.ENGINE_AI_PLAYER;
  if (vars.ENGINE_BASE_DEPTH !== undefined) overrides.baseDepth = vars.ENGINE_BASE_DEPTH;
  if (vars.ENGINE_DEPTH_GROWTH !== undefined) overrides.depthGrowth = vars.ENGINE_DEPTH_GROWTH;
  return resolveConfig(overrides);
}
