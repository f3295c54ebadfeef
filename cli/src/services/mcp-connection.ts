import { spawn, type ChildProcess } from 'child_process'
import type { Readable, Writable } from 'stream'
import { APP_NAME, APP_VERSION } from '../constants/app-constants'
import { BackendUnavailableError, errorMessage } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'
import type {
  JsonRpcError,
  MCPInitializeResult,
  MCPToolCallResult,
  MCPToolDefinition,
  MCPToolsListResult,
  PendingRequest,
  ToolCaller,
} from './mcp-types'

const PROTOCOL_VERSION = '2024-11-05'

export interface McpConnectionConfig {
  /** Interpreter or server binary */
  command: string
  args?: string[]
  env?: Record<string, string>
  requestTimeoutMs: number
  logger?: Logger
}

export type ConnectionStatus = 'stopped' | 'starting' | 'running' | 'error'

/**
 * JSON-RPC error returned by the server for a specific request
 */
export class McpRequestError extends Error {
  readonly code: number
  readonly method: string

  constructor(method: string, error: JsonRpcError) {
    super(error.message || 'MCP error')
    this.name = 'McpRequestError'
    this.code = error.code
    this.method = method
  }
}

function isJsonRpcError(value: unknown): value is JsonRpcError {
  return typeof value === 'object' && value !== null && 'message' in value
}

/**
 * Connection to one MCP server over stdio (JSON-RPC 2.0, one message per line)
 */
export class McpConnection implements ToolCaller {
  private process: ChildProcess | null = null
  private input: Writable | null = null
  private responseBuffer = ''
  private pendingRequests: Map<number, PendingRequest> = new Map()
  private requestId = 0
  private readonly logger: Logger

  status: ConnectionStatus = 'stopped'
  error?: string
  serverInfo?: MCPInitializeResult
  tools?: MCPToolDefinition[]

  constructor(private readonly config: McpConnectionConfig) {
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Spawn the server process and initialize the protocol
   */
  async start(): Promise<void> {
    if (this.status === 'running') return

    this.status = 'starting'
    const proc = spawn(this.config.command, this.config.args ?? [], {
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...this.config.env },
    })
    this.process = proc

    proc.stderr?.on('data', (data: Buffer) => {
      // Server diagnostics; not an error by themselves
      const msg = data.toString().trim()
      if (msg) {
        this.logger.debug(msg, 'backend stderr')
      }
    })

    proc.on('error', err => {
      this.status = 'error'
      this.error = err.message
      this.rejectAllPending(`Failed to start backend: ${err.message}`)
    })

    proc.on('exit', code => {
      this.status = 'stopped'
      this.process = null
      this.input = null
      if (code !== 0) {
        this.error = `Exited with code ${code}`
      }
      this.rejectAllPending('Backend server exited')
    })

    if (!proc.stdin || !proc.stdout) {
      throw new BackendUnavailableError('Backend process has no stdio pipes')
    }
    await this.attach(proc.stdin, proc.stdout)
  }

  /**
   * Wire the connection to a pair of streams and run the handshake.
   * `start()` uses the child's pipes; tests hand in PassThrough streams.
   */
  async attach(input: Writable, output: Readable): Promise<void> {
    this.input = input
    this.responseBuffer = ''
    this.pendingRequests.clear()
    this.requestId = 0
    this.status = 'starting'

    output.on('data', (data: Buffer | string) => {
      this.responseBuffer += data.toString()
      this.processResponseBuffer()
    })

    try {
      const result = (await this.request('initialize', {
        protocolVersion: PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: { name: APP_NAME, version: APP_VERSION },
      })) as MCPInitializeResult

      this.serverInfo = result
      this.notify('notifications/initialized', {})

      if (result.capabilities?.tools) {
        const listed = (await this.request('tools/list', {})) as MCPToolsListResult
        this.tools = listed.tools || []
      }

      this.status = 'running'
      this.logger.info(
        { server: result.serverInfo?.name, tools: this.tools?.length ?? 0 },
        'Backend connected'
      )
    } catch (err) {
      this.status = 'error'
      this.error = errorMessage(err)
      this.stop()
      throw new BackendUnavailableError(`MCP initialize failed: ${this.error}`, { cause: err })
    }
  }

  /**
   * Call a tool on the server
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: { signal?: AbortSignal } = {}
  ): Promise<MCPToolCallResult> {
    return (await this.request('tools/call', { name, arguments: args }, options.signal)) as MCPToolCallResult
  }

  /**
   * Send a request (JSON-RPC over stdio)
   */
  request(method: string, params?: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const input = this.input
    if (!input) {
      return Promise.reject(new BackendUnavailableError(`Backend is not running (${method})`))
    }

    return new Promise((resolve, reject) => {
      const id = ++this.requestId
      const request = JSON.stringify({ jsonrpc: '2.0', id, method, params })

      const timeout = setTimeout(() => {
        this.pendingRequests.delete(id)
        reject(new BackendUnavailableError(`MCP request timeout: ${method}`))
      }, this.config.requestTimeoutMs)

      signal?.addEventListener(
        'abort',
        () => {
          if (this.pendingRequests.delete(id)) {
            clearTimeout(timeout)
            reject(new BackendUnavailableError(`MCP request aborted: ${method}`))
          }
        },
        { once: true }
      )

      this.pendingRequests.set(id, { method, resolve, reject, timeout })
      input.write(request + '\n')
    })
  }

  /**
   * Kill the server and fail anything still waiting
   */
  stop(): void {
    this.rejectAllPending('Backend connection closed')
    this.input = null
    if (this.process) {
      this.process.kill()
      this.process = null
    }
    if (this.status !== 'error') {
      this.status = 'stopped'
    }
  }

  /** Requests awaiting a response */
  get pendingCount(): number {
    return this.pendingRequests.size
  }

  /**
   * Send a notification (no response expected)
   */
  private notify(method: string, params: Record<string, unknown>): void {
    this.input?.write(JSON.stringify({ jsonrpc: '2.0', method, params }) + '\n')
  }

  /**
   * Process buffered responses and resolve pending requests
   */
  private processResponseBuffer(): void {
    const lines = this.responseBuffer.split('\n')
    this.responseBuffer = lines.pop() || '' // Keep incomplete line

    for (const line of lines) {
      if (!line.trim()) continue

      let json: unknown
      try {
        json = JSON.parse(line)
      } catch {
        // Servers print banners and log lines on stdout too
        this.logger.debug(line, 'non-JSON line from backend')
        continue
      }
      if (typeof json !== 'object' || json === null) {
        this.logger.debug(line, 'non-object JSON line from backend')
        continue
      }

      const parsed: { id?: unknown; result?: unknown; error?: unknown } = json
      if (typeof parsed.id !== 'number') continue
      const pending = this.pendingRequests.get(parsed.id)
      if (!pending) continue

      clearTimeout(pending.timeout)
      this.pendingRequests.delete(parsed.id)
      if (parsed.error !== undefined && parsed.error !== null) {
        pending.reject(
          isJsonRpcError(parsed.error)
            ? new McpRequestError(pending.method, parsed.error)
            : new McpRequestError(pending.method, { code: -32603, message: String(parsed.error) })
        )
      } else {
        pending.resolve(parsed.result)
      }
    }
  }

  /**
   * Reject all pending requests (used on disconnect)
   */
  private rejectAllPending(reason: string): void {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timeout)
      pending.reject(new BackendUnavailableError(`${reason} (${pending.method})`))
    }
    this.pendingRequests.clear()
  }
}
