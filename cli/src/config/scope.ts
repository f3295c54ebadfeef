/**
 * Command-line parsing for drvtriage
 * Determines the unit entrypoint to run, its target and config overrides
 */

import { APP_NAME, COMMANDS, isCommandName, type CommandName } from '../constants/app-constants'
import { tryParseAddress } from '../utils/address'
import { ConfigError } from '../utils/errors'
import { LOG_LEVELS } from '../utils/logger'
import type { TriageConfigInput } from '../utils/user-config'

export type MetaCommand = 'init' | 'help' | 'version'

export interface TargetArg {
  address: number
  name: string
}

export interface ScopeConfig {
  command: CommandName | MetaCommand
  target?: TargetArg
  /** config.json to read instead of ~/.drvtriage/config.json */
  configPath?: string
  /** Markdown file handed to analyze-irp-access as context */
  contextPath?: string
  overrides: Partial<TriageConfigInput>
}

type ValueFlag = (scope: ScopeConfig, value: string, target: Partial<TargetArg>) => void

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '--address': (_, value, target) => {
    target.address = requireAddress(value)
  },
  '--name': (_, value, target) => {
    target.name = value
  },
  '--func-name': (_, value, target) => {
    target.name = value
  },
  '--input-json': (_, value, target) => {
    Object.assign(target, parseTargetJson(value))
  },
  '--config': (scope, value) => {
    scope.configPath = value
  },
  '--context': (scope, value) => {
    scope.contextPath = value
  },
  '--model': (scope, value) => {
    scope.overrides.model = value
  },
  '--llm-base-url': (scope, value) => {
    scope.overrides.llmBaseUrl = value
  },
  '--ida-python': (scope, value) => {
    scope.overrides.backendExecutablePath = value
  },
  '--ida-server': (scope, value) => {
    scope.overrides.backendServerPath = value
  },
  '--cache': (scope, value) => {
    scope.overrides.cachePath = value
  },
  '--report-dir': (scope, value) => {
    scope.overrides.reportDir = value
  },
  '--entry-symbol': (scope, value) => {
    scope.overrides.entrySymbol = value
  },
  '--concurrency': (scope, value) => {
    scope.overrides.concurrency = Number(value)
  },
  '--backend-timeout': (scope, value) => {
    scope.overrides.backendTimeoutMs = Number(value)
  },
  '--llm-timeout': (scope, value) => {
    scope.overrides.llmTimeoutMs = Number(value)
  },
  '--log-level': (scope, value) => {
    const level = LOG_LEVELS.find(candidate => candidate === value)
    if (!level) {
      throw new ConfigError(`--log-level must be one of ${LOG_LEVELS.join(', ')}`)
    }
    scope.overrides.logLevel = level
  },
}

function requireAddress(value: unknown): number {
  const address = tryParseAddress(value)
  if (address === null) {
    throw new ConfigError(`Not a hex address: ${String(value)}`)
  }
  return address
}

/**
 * `{"address":"0x11170","func_name":"sub_11170"}` (or `name`)
 */
export function parseTargetJson(json: string): Partial<TargetArg> {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    throw new ConfigError(`Cannot parse --input-json: ${json}`, { cause: err })
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('--input-json must be a JSON object')
  }

  const target: Partial<TargetArg> = {}
  if ('address' in parsed) {
    target.address = requireAddress(parsed.address)
  }
  const name = 'func_name' in parsed ? parsed.func_name : 'name' in parsed ? parsed.name : undefined
  if (typeof name === 'string' && name.length > 0) {
    target.name = name
  }
  return target
}

/**
 * Parse CLI arguments
 * Handles: <command>, target flags, config override flags, --annotate, --help, --version
 */
export function parseScope(argv: string[]): ScopeConfig {
  const args = argv.slice(2) // Remove node and script path
  const scope: ScopeConfig = { command: 'help', overrides: {} }
  const target: Partial<TargetArg> = {}
  let command: string | undefined

  let i = 0
  while (i < args.length) {
    const arg = args[i]

    if (arg === '--help' || arg === '-h') {
      return { command: 'help', overrides: {} }
    }
    if (arg === '--version' || arg === '-v') {
      return { command: 'version', overrides: {} }
    }
    if (arg === '--annotate') {
      scope.overrides.annotateDispatch = true
      i++
      continue
    }

    const flag = VALUE_FLAGS[arg]
    if (flag) {
      const value = args[i + 1]
      if (value === undefined) {
        throw new ConfigError(`${arg} needs a value`)
      }
      flag(scope, value, target)
      i += 2
      continue
    }

    if (arg.startsWith('-')) {
      throw new ConfigError(`Unknown option: ${arg}`)
    }
    if (command !== undefined) {
      throw new ConfigError(`Unexpected argument: ${arg}`)
    }
    command = arg
    i++
  }

  if (command === undefined) {
    return scope
  }
  if (command !== 'init' && !isCommandName(command)) {
    throw new ConfigError(`Unknown command: ${command}. Run ${APP_NAME} --help`)
  }
  scope.command = command

  if (target.address !== undefined || target.name !== undefined) {
    if (target.address === undefined || target.name === undefined) {
      throw new ConfigError('A target needs both --address and --name (or --input-json with address and func_name)')
    }
    scope.target = { address: target.address, name: target.name }
  }

  const needsTarget = COMMANDS.some(entry => entry.name === command && entry.needsTarget)
  if (needsTarget && !scope.target) {
    throw new ConfigError(`${command} needs a target: --address <hex> --name <name> or --input-json`)
  }

  return scope
}

export function formatUsage(): string {
  const width = Math.max(...COMMANDS.map(command => command.name.length))
  const commands = COMMANDS.map(command => `  ${command.name.padEnd(width)}  ${command.description}`)

  return [
    `Usage: ${APP_NAME} <command> [options]`,
    '',
    'Commands:',
    ...commands,
    `  ${'init'.padEnd(width)}  Write a default ~/.drvtriage/config.json`,
    '',
    'Target:',
    '  --address <hex> --name <name>     Function (or IAT entry) to analyze',
    `  --input-json '{"address":"0x11170","func_name":"sub_11170"}'`,
    '',
    'Options:',
    '  --config <path>  --model <id>  --llm-base-url <url>  --ida-python <exe>  --ida-server <script>',
    '  --cache <path>  --report-dir <dir>  --entry-symbol <name>  --concurrency <n>',
    '  --backend-timeout <ms>  --llm-timeout <ms>  --log-level <level>  --context <file>  --annotate',
  ].join('\n')
}
