import { homedir } from 'os'
import { join, resolve } from 'path'
import { existsSync, mkdirSync, writeFileSync, readFileSync } from 'fs'
import { z } from 'zod'
import {
  DEFAULT_BACKEND_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_ENTRY_SYMBOL,
  DEFAULT_LLM_TIMEOUT_MS,
  DEFAULT_MODEL_ID,
  IRP_MJ_DEVICE_CONTROL,
  resolveModelId,
} from '../constants/app-constants'
import { LOG_LEVELS } from './logger'
import { ConfigError } from './errors'
import { getApiKey } from './api-keys'

/**
 * User configuration directory structure
 * ~/.drvtriage/
 * ├── config.json                    - Global config
 * └── external_function_cache.jsonl  - Default external-symbol cache
 */

export type Env = Record<string, string | undefined>

export function triageHome(env: Env = process.env): string {
  return env.DRVTRIAGE_HOME || join(homedir(), '.drvtriage')
}

export function userDirs(env: Env = process.env) {
  const root = triageHome(env)
  return {
    root,
    config: join(root, 'config.json'),
    cache: join(root, 'external_function_cache.jsonl'),
  } as const
}

const positiveInt = z.coerce.number().int().positive()

/**
 * Runtime configuration, built once at startup and handed to every component
 */
export const triageConfigSchema = z.object({
  /** LLM credential; only commands that call the LLM require it */
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default(DEFAULT_MODEL_ID).transform(resolveModelId),
  /** OpenAI-compatible endpoint; OpenRouter is used when absent */
  llmBaseUrl: z.string().url().optional(),
  /** Interpreter that hosts the MCP server script (IDA's python) */
  backendExecutablePath: z.string().min(1).default('python3'),
  /** MCP server script exposing the IDA database */
  backendServerPath: z.string().min(1).optional(),
  cachePath: z.string().min(1),
  reportDir: z.string().min(1).default('reports'),
  backendTimeoutMs: positiveInt.default(DEFAULT_BACKEND_TIMEOUT_MS),
  llmTimeoutMs: positiveInt.default(DEFAULT_LLM_TIMEOUT_MS),
  concurrency: positiveInt.max(32).default(DEFAULT_CONCURRENCY),
  entrySymbol: z.string().min(1).default(DEFAULT_ENTRY_SYMBOL),
  dispatchSlot: z.coerce.number().int().min(0).max(27).default(IRP_MJ_DEVICE_CONTROL),
  annotateDispatch: z.boolean().default(false),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

export type TriageConfig = z.output<typeof triageConfigSchema>
export type TriageConfigInput = z.input<typeof triageConfigSchema>

export interface ConfigSources {
  env?: Env
  /** Path to config.json; defaults to ~/.drvtriage/config.json */
  configPath?: string
  /** Highest precedence (CLI flags) */
  overrides?: Partial<TriageConfigInput>
}

/**
 * Read config.json; a missing file is an empty config
 */
export function loadConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (err) {
    throw new ConfigError(`Cannot parse ${path}`, { cause: err })
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`${path} must contain a JSON object`)
  }
  return { ...parsed }
}

function fromEnv(env: Env): Partial<TriageConfigInput> {
  const values: Partial<TriageConfigInput> = {}

  const apiKey = getApiKey(env, 'DRVTRIAGE_API_KEY') ?? getApiKey(env, 'OPENROUTER_API_KEY')
  if (apiKey) values.apiKey = apiKey
  if (env.DRVTRIAGE_MODEL) values.model = env.DRVTRIAGE_MODEL
  if (env.DRVTRIAGE_LLM_BASE_URL) values.llmBaseUrl = env.DRVTRIAGE_LLM_BASE_URL
  if (env.IDA_PYTHON_EXE) values.backendExecutablePath = env.IDA_PYTHON_EXE
  if (env.IDA_MCP_SERVER) values.backendServerPath = env.IDA_MCP_SERVER
  if (env.EXTERNAL_FUNC_CACHE) values.cachePath = env.EXTERNAL_FUNC_CACHE

  const logLevel = LOG_LEVELS.find(level => level === env.DRVTRIAGE_LOG_LEVEL)
  if (logLevel) values.logLevel = logLevel

  return values
}

/**
 * Build the config: defaults < config.json < environment < overrides
 */
export function loadConfig(sources: ConfigSources = {}): TriageConfig {
  const env = sources.env ?? process.env
  const dirs = userDirs(env)

  const merged = {
    cachePath: dirs.cache,
    ...loadConfigFile(sources.configPath ?? dirs.config),
    ...fromEnv(env),
    ...sources.overrides,
  }

  const result = triageConfigSchema.safeParse(merged)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${issues}`)
  }

  return {
    ...result.data,
    cachePath: resolve(result.data.cachePath),
    reportDir: resolve(result.data.reportDir),
  }
}

/**
 * Initialize the user config directory with a default config.json
 */
export function initUserConfig(env: Env = process.env): { created: boolean; path: string } {
  const dirs = userDirs(env)
  const alreadyExists = existsSync(dirs.config)

  if (!alreadyExists) {
    mkdirSync(dirs.root, { recursive: true })
    const defaultConfig: TriageConfigInput = {
      model: DEFAULT_MODEL_ID,
      backendExecutablePath: 'python3',
      cachePath: dirs.cache,
      concurrency: DEFAULT_CONCURRENCY,
    }
    writeFileSync(dirs.config, JSON.stringify(defaultConfig, null, 2))
  }

  return { created: !alreadyExists, path: dirs.config }
}
