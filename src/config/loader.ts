import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { createLogger, describeError } from '../logging/logger.js';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const transformSchema = z.enum(['regex', 'substring', 'fuzzy']);

const fileConfigSchema = z
  .object({
    search: z
      .object({
        findCommand: z.string().min(1),
        grepCommand: z.string().min(1),
        transform: transformSchema,
      })
      .partial(),
    worker: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()),
        maxCandidates: z.number().int(),
        chunkSize: z.number().int(),
        shell: z.string().min(1),
      })
      .partial(),
    session: z.object({ requestTimeoutMs: z.number().int() }).partial(),
    picker: z.object({ limit: z.number().int() }).partial(),
    logLevel: logLevelSchema,
  })
  .partial();

export type FileConfig = z.infer<typeof fileConfigSchema>;

function mergeConfig(base: AppConfig, override: FileConfig): AppConfig {
  return {
    search: { ...base.search, ...override.search },
    worker: { ...base.worker, ...override.worker },
    session: { ...base.session, ...override.session },
    picker: { ...base.picker, ...override.picker },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function loadFileConfig(cwd: string): FileConfig {
  const candidates = [join(cwd, '.lineseek.json'), join(cwd, 'lineseek.config.json')];
  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err: unknown) {
      createLogger('warn', 'config').warn(`Skipping ${candidate}: ${describeError(err)}`);
      continue;
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (parsed.success) return parsed.data;
    const issue = parsed.error.issues[0];
    createLogger('warn', 'config').warn(
      `Skipping ${candidate}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid config'}`,
    );
  }
  return {};
}

function loadEnvOverrides(env: NodeJS.ProcessEnv): FileConfig {
  const overrides: FileConfig = {};

  const logLevel = logLevelSchema.safeParse(env['LINESEEK_LOG_LEVEL']);
  if (logLevel.success) {
    overrides.logLevel = logLevel.data;
  }

  const transform = transformSchema.safeParse(env['LINESEEK_TRANSFORM']);
  const findCommand = env['LINESEEK_FIND_COMMAND'];
  const grepCommand = env['LINESEEK_GREP_COMMAND'];
  if (transform.success || findCommand || grepCommand) {
    overrides.search = {
      ...(transform.success ? { transform: transform.data } : {}),
      ...(findCommand ? { findCommand } : {}),
      ...(grepCommand ? { grepCommand } : {}),
    };
  }

  const timeout = env['LINESEEK_REQUEST_TIMEOUT_MS'];
  if (timeout !== undefined && /^\d+$/.test(timeout)) {
    overrides.session = { requestTimeoutMs: parseInt(timeout, 10) };
  }

  return overrides;
}

export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = loadFileConfig(cwd);
  const envOverrides = loadEnvOverrides(env);

  let config = mergeConfig(DEFAULT_CONFIG, fileConfig);
  config = mergeConfig(config, envOverrides);

  return config;
}
