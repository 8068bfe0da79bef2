import os from 'os';
import path from 'path';
import { z } from 'zod';
import { EngineError } from './errors';
import { permissionModes } from './permission-modes';

export const CumulativeResetScopeSchema = z.enum(['segment', 'message']);
export type CumulativeResetScope = z.infer<typeof CumulativeResetScopeSchema>;

export const EngineConfigSchema = z.object({
  command: z.string().min(1).default('claude'),
  args: z.array(z.string()).default([]),
  model: z.string().min(1).optional(),
  env: z.record(z.string()).default({ MCP_TOOL_TIMEOUT: '30000000' }),
  abortTimeoutMs: z.number().int().positive().default(2000),
  permissionTimeoutMs: z.number().int().positive().default(300_000),
  /** Name of a registered permission mode; built in: `ask`, `deny`, `allow`. */
  askUserBehavior: z.string().min(1).default('ask'),
  cumulativeResetScope: CumulativeResetScopeSchema.default('segment'),
  storeDir: z.string().min(1).optional(),
  transcriptRoot: z.string().min(1).optional(),
  internalToolPrefixes: z.array(z.string().min(1)).default([]),
  blockedTools: z.array(z.string().min(1)).default([]),
  /** Deny `Read` of paths the working directory's `.gitignore` ignores. */
  respectGitignore: z.boolean().default(true),
  debug: z.boolean().default(false),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type EngineConfig = z.output<typeof EngineConfigSchema> & {
  storeDir: string;
  transcriptRoot: string;
};

type Env = Record<string, string | undefined>;

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function fromEnv(env: Env): Record<string, unknown> {
  const values: Record<string, unknown> = {
    command: env.AGENT_ENGINE_COMMAND,
    model: env.AGENT_ENGINE_MODEL,
    abortTimeoutMs: envNumber(env.AGENT_ENGINE_ABORT_TIMEOUT_MS),
    permissionTimeoutMs: envNumber(env.AGENT_ENGINE_PERMISSION_TIMEOUT_MS),
    askUserBehavior: env.AGENT_ENGINE_ASK_USER,
    storeDir: env.AGENT_ENGINE_STORE_DIR,
    transcriptRoot: env.AGENT_ENGINE_TRANSCRIPT_ROOT,
    respectGitignore: envBoolean(env.AGENT_ENGINE_RESPECT_GITIGNORE),
    debug: envBoolean(env.AGENT_ENGINE_DEBUG),
  };
  const defined: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) defined[key] = value;
  }
  return defined;
}

/**
 * Resolve engine configuration. Explicit overrides win over environment variables,
 * which win over schema defaults.
 */
export function resolveEngineConfig(
  overrides: EngineConfigInput = {},
  env: Env = process.env,
  cwd: string = process.cwd()
): EngineConfig {
  const merged = fromEnv(env);
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new EngineError('INVALID_CONFIG', `Invalid engine configuration: ${issues.join('; ')}`);
  }

  if (!permissionModes.get(parsed.data.askUserBehavior)) {
    throw new EngineError(
      'INVALID_CONFIG',
      `Invalid engine configuration: askUserBehavior: unknown permission mode "${parsed.data.askUserBehavior}" (known: ${permissionModes.list().join(', ')})`
    );
  }

  return {
    ...parsed.data,
    storeDir: parsed.data.storeDir ?? path.join(cwd, '.agent-engine', 'sessions'),
    transcriptRoot: parsed.data.transcriptRoot ?? path.join(os.homedir(), '.claude', 'projects'),
  };
}
