import { readFileSync } from 'node:fs'
import { isAbsolute, resolve } from 'node:path'
import { parse as parseDotenv } from 'dotenv'
import { z } from 'zod'

export const ADAPTER_CONFIG_ENV_VAR = 'RX_BAAS_CONFIG'
export const DEFAULT_CONFIG_FILE_NAME = 'rx-baas.json'

export type AdapterConfig = {
  remoteConfig: {
    expirationDurationSeconds: number
    activateFetched: boolean
  }
  storage: {
    maxDownloadSizeBytes: number
  }
  diagnostics: {
    warnOnLateCallback: boolean
  }
}

const RemoteConfigSectionSchema = z.object({
  // Vendor default: twelve hours.
  expirationDurationSeconds: z.number().int().min(0).default(43_200),
  activateFetched: z.boolean().default(true),
}).strict()

const StorageSectionSchema = z.object({
  maxDownloadSizeBytes: z.number().int().min(1).default(10 * 1024 * 1024),
}).strict()

const DiagnosticsSectionSchema = z.object({
  warnOnLateCallback: z.boolean().default(false),
}).strict()

const AdapterConfigSchema = z.object({
  remoteConfig: RemoteConfigSectionSchema.default({}),
  storage: StorageSectionSchema.default({}),
  diagnostics: DiagnosticsSectionSchema.default({}),
}).strict()

export function createDefaultAdapterConfig(): AdapterConfig {
  return {
    remoteConfig: { expirationDurationSeconds: 43_200, activateFetched: true },
    storage: { maxDownloadSizeBytes: 10 * 1024 * 1024 },
    diagnostics: { warnOnLateCallback: false },
  }
}

/**
 * Validate adapter configuration from arbitrary JSON-like input.
 * Omitted sections and fields take their defaults.
 */
export function parseAdapterConfig(input: unknown, sourceName: string): AdapterConfig {
  const result = AdapterConfigSchema.safeParse(input)
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new Error(`${sourceName} validation failed: ${message}`)
  }

  return result.data
}

function parseJsonInput(raw: string, sourceName: string): unknown {
  try {
    return JSON.parse(raw) as unknown
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`${sourceName} is not valid JSON: ${reason}`)
  }
}

function readOptionalFile(path: string, sourceName: string): string | null {
  try {
    return readFileSync(path, 'utf8')
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null
    const reason = error instanceof Error ? error.message : String(error)
    throw new Error(`${sourceName} path is unreadable: ${path} (${reason})`)
  }
}

export type LoadedAdapterConfig = {
  config: AdapterConfig
  sourceName: string
}

/**
 * Resolve adapter configuration.
 *
 * Input source priority:
 * 1. `raw`, or `RX_BAAS_CONFIG` from `env` (merged over `envFile` entries):
 *    inline JSON or a path relative to `cwd`
 * 2. `<cwd>/rx-baas.json`
 * 3. defaults
 */
export function loadAdapterConfig(opts: {
  raw?: string
  cwd?: string
  env?: Record<string, string | undefined>
  envFile?: string
} = {}): LoadedAdapterConfig {
  const cwd = opts.cwd ?? process.cwd()
  let env: Record<string, string | undefined> = opts.env ?? process.env

  if (opts.envFile) {
    const envPath = isAbsolute(opts.envFile) ? opts.envFile : resolve(cwd, opts.envFile)
    const content = readOptionalFile(envPath, 'env file')
    // Variables already present in the environment win over the file.
    if (content !== null) env = { ...parseDotenv(content), ...env }
  }

  const raw = opts.raw ?? env[ADAPTER_CONFIG_ENV_VAR]
  if (raw && raw.trim()) {
    const trimmed = raw.trim()
    if (trimmed.startsWith('{')) {
      return {
        config: parseAdapterConfig(parseJsonInput(trimmed, ADAPTER_CONFIG_ENV_VAR), ADAPTER_CONFIG_ENV_VAR),
        sourceName: ADAPTER_CONFIG_ENV_VAR,
      }
    }

    const configPath = isAbsolute(trimmed) ? trimmed : resolve(cwd, trimmed)
    const sourceName = `${ADAPTER_CONFIG_ENV_VAR} file (${configPath})`
    const content = readOptionalFile(configPath, ADAPTER_CONFIG_ENV_VAR)
    if (content === null) {
      throw new Error(`${ADAPTER_CONFIG_ENV_VAR} points to a missing file: ${configPath}`)
    }
    return {
      config: parseAdapterConfig(parseJsonInput(content, sourceName), sourceName),
      sourceName,
    }
  }

  const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE_NAME)
  const sourceName = `default config file (${defaultPath})`
  const content = readOptionalFile(defaultPath, sourceName)
  if (content === null) {
    return { config: createDefaultAdapterConfig(), sourceName: 'defaults' }
  }

  return {
    config: parseAdapterConfig(parseJsonInput(content, sourceName), sourceName),
    sourceName,
  }
}
