export const APP_NAME = 'drvtriage'
export const APP_VERSION = '0.3.0'

export const MODELS = ['qwen', 'deepseek', 'claude', 'gpt'] as const
export type ModelName = (typeof MODELS)[number]

// Short names accepted by --model; anything else is taken as a full model ID
// See https://openrouter.ai/models for valid IDs
export const MODEL_IDS: Record<ModelName, string> = {
  qwen: 'qwen/qwen-max',
  deepseek: 'deepseek/deepseek-chat-v3.1',
  claude: 'anthropic/claude-3.7-sonnet',
  gpt: 'openai/gpt-4o',
}

export const DEFAULT_MODEL_ID = MODEL_IDS.qwen

function isModelName(model: string): model is ModelName {
  return MODELS.some(name => name === model)
}

export function resolveModelId(model: string): string {
  return isModelName(model) ? MODEL_IDS[model] : model
}

// Driver structure facts
export const DEFAULT_ENTRY_SYMBOL = 'IoCreateDevice'
export const IRP_MJ_DEVICE_CONTROL = 14
export const MAJOR_FUNCTION_OFFSET = { x64: 0x70, x86: 0x38 } as const
export const POINTER_SIZE = { x64: 8, x86: 4 } as const
export const DISPATCH_PROTOTYPE = 'NTSTATUS DriverDispatch(PDEVICE_OBJECT DeviceObject, PIRP Irp);'
export const IO_CONTROL_CODE_NAME = 'IoControlCode'

// Timeouts (ms)
export const DEFAULT_BACKEND_TIMEOUT_MS = 30_000
export const DEFAULT_LLM_TIMEOUT_MS = 120_000
export const DEFAULT_CONCURRENCY = 4

// Backend MCP tool names (ida-pro-mcp)
export const BACKEND_TOOLS = {
  listImports: 'list_imports',
  xrefsTo: 'get_xrefs_to',
  functionByAddress: 'get_function_by_address',
  functionByName: 'get_function_by_name',
  decompile: 'decompile_function',
  callees: 'get_callees',
  renameLocal: 'rename_local_variable',
  setPrototype: 'set_function_prototype',
} as const

export const IMPORT_PAGE_SIZE = 500

// Unit entrypoints exposed by the CLI
export interface Command {
  name: string
  description: string
  /** Whether the command needs an {address, name} target */
  needsTarget: boolean
  /** Talks to the IDA MCP server */
  needsBackend: boolean
  /** Calls the LLM (and so needs an API key) */
  needsLlm: boolean
  /** Opens the external-symbol cache */
  usesCache: boolean
}

export const COMMANDS = [
  {
    name: 'discover-entries',
    description: 'List routines that reference the entry symbol',
    needsTarget: false,
    needsBackend: true,
    needsLlm: false,
    usesCache: false,
  },
  {
    name: 'resolve-dispatch-target',
    description: 'Resolve the MajorFunction handler stored by a caller',
    needsTarget: true,
    needsBackend: true,
    needsLlm: true,
    usesCache: false,
  },
  {
    name: 'list-subfunctions',
    description: 'List and classify direct callees',
    needsTarget: true,
    needsBackend: true,
    needsLlm: false,
    usesCache: false,
  },
  {
    name: 'describe-external',
    description: 'Describe an imported symbol (cached)',
    needsTarget: true,
    needsBackend: false,
    needsLlm: true,
    usesCache: true,
  },
  {
    name: 'describe-internal',
    description: 'Describe an internal routine from its pseudocode',
    needsTarget: true,
    needsBackend: true,
    needsLlm: true,
    usesCache: false,
  },
  {
    name: 'analyze-memory-parameters',
    description: 'Parameters that address memory read/write/copy',
    needsTarget: true,
    needsBackend: true,
    needsLlm: true,
    usesCache: false,
  },
  {
    name: 'analyze-memory-flow',
    description: 'Trace parameters through calls to memory operations',
    needsTarget: true,
    needsBackend: true,
    needsLlm: true,
    usesCache: false,
  },
  {
    name: 'analyze-irp-access',
    description: 'Memory accesses controllable through the IRP',
    needsTarget: true,
    needsBackend: true,
    needsLlm: true,
    usesCache: false,
  },
  {
    name: 'run-full-pipeline',
    description: 'Run every step and write the Markdown report',
    needsTarget: false,
    needsBackend: true,
    needsLlm: true,
    usesCache: true,
  },
  {
    name: 'compact-cache',
    description: 'Rewrite the external-symbol cache without superseded records',
    needsTarget: false,
    needsBackend: false,
    needsLlm: false,
    usesCache: true,
  },
] as const satisfies readonly Command[]

export type CommandName = (typeof COMMANDS)[number]['name']

export function findCommand(name: CommandName): Command {
  const command = COMMANDS.find(candidate => candidate.name === name)
  if (!command) throw new Error(`Unknown command: ${name}`)
  return command
}

export function isCommandName(name: string): name is CommandName {
  return COMMANDS.some(command => command.name === name)
}
