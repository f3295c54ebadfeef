/**
 * In-process stand-ins for the IDA MCP server and the LLM
 */

import { mkdtempSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import type { ChatMessage, LlmBackend, LlmCallOptions, StructuredSchema } from '../services/llm'
import type { MCPToolCallResult, ToolCaller } from '../services/mcp-types'
import { formatAddress, parseAddress } from '../utils/address'

export interface ToolCall {
  name: string
  args: Record<string, unknown>
}

export type ToolHandler = (args: Record<string, unknown>) => unknown | Promise<unknown>

/** Thrown by a handler to produce an `isError` tool result */
export class ToolError extends Error {}

export class FakeToolCaller implements ToolCaller {
  readonly calls: ToolCall[] = []

  constructor(private readonly handlers: Record<string, ToolHandler> = {}) {}

  on(name: string, handler: ToolHandler): this {
    this.handlers[name] = handler
    return this
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<MCPToolCallResult> {
    this.calls.push({ name, args })
    const handler = this.handlers[name]
    if (!handler) {
      return { content: [{ type: 'text', text: `Unknown tool: ${name}` }], isError: true }
    }

    try {
      const value = await handler(args)
      const text = typeof value === 'string' ? value : JSON.stringify(value)
      return { content: [{ type: 'text', text }] }
    } catch (err) {
      if (err instanceof ToolError) {
        return { content: [{ type: 'text', text: err.message }], isError: true }
      }
      throw err
    }
  }

  callsTo(name: string): ToolCall[] {
    return this.calls.filter(call => call.name === name)
  }
}

export interface FakeFunction {
  address: number
  name: string
  size: number
  /** Omitted: decompilation fails */
  pseudocode?: string
  callees?: Array<{ address: number; name: string }>
}

export interface FakeDriver {
  imports: Array<{ address: number; name: string }>
  /** Import address -> referencing instruction addresses */
  xrefs?: Record<number, number[]>
  functions: FakeFunction[]
}

/**
 * A ToolCaller answering the IDA tools from a small driver model
 */
export function fakeIda(driver: FakeDriver): FakeToolCaller {
  const containing = (address: number): FakeFunction | undefined =>
    driver.functions.find(fn => address >= fn.address && address < fn.address + fn.size)
  const asFunction = (fn: FakeFunction) => ({ address: formatAddress(fn.address), name: fn.name, size: formatAddress(fn.size) })

  return new FakeToolCaller({
    list_imports: args => {
      const offset = Number(args.offset ?? 0)
      const count = Number(args.count ?? 100)
      const page = driver.imports.slice(offset, offset + count)
      const next = offset + count < driver.imports.length ? offset + count : null
      return {
        data: page.map(entry => ({ address: formatAddress(entry.address), imported_name: entry.name, module: 'ntoskrnl.exe' })),
        next_offset: next,
      }
    },
    get_xrefs_to: args => {
      const refs = driver.xrefs?.[parseAddress(args.address)] ?? []
      return refs.map(address => ({ address: formatAddress(address), type: 'code' }))
    },
    get_function_by_address: args => {
      const fn = containing(parseAddress(args.address))
      if (!fn) throw new ToolError(`No function found containing address ${String(args.address)}`)
      return asFunction(fn)
    },
    get_function_by_name: args => {
      const fn = driver.functions.find(candidate => candidate.name === args.name)
      if (!fn) throw new ToolError(`No function found with name ${String(args.name)}`)
      return asFunction(fn)
    },
    decompile_function: args => {
      const fn = containing(parseAddress(args.address))
      if (!fn?.pseudocode) throw new ToolError(`Decompilation failed at ${String(args.address)}`)
      return fn.pseudocode
    },
    get_callees: args => {
      const fn = containing(parseAddress(args.function_address))
      if (!fn) throw new ToolError('No function found')
      return (fn.callees ?? []).map(callee => ({ address: formatAddress(callee.address), name: callee.name, type: 'call' }))
    },
    rename_local_variable: () => 'ok',
    set_function_prototype: () => 'ok',
  })
}

export type LlmResponder = (prompt: string, messages: ChatMessage[]) => string | Promise<string>

/**
 * Text-only LLM; replies come from `responder` given the last user message
 */
export class FakeLlm implements LlmBackend {
  readonly prompts: string[] = []

  constructor(private readonly responder: LlmResponder) {}

  async complete(messages: ChatMessage[], _options?: LlmCallOptions): Promise<string> {
    const prompt = lastUserMessage(messages)
    this.prompts.push(prompt)
    return this.responder(prompt, messages)
  }
}

/**
 * LLM with structured output; `structured` returns the raw object to validate
 */
export class FakeStructuredLlm extends FakeLlm {
  readonly structuredPrompts: string[] = []

  constructor(
    responder: LlmResponder,
    private readonly structured: (prompt: string) => unknown
  ) {
    super(responder)
  }

  async completeStructured<T>(messages: ChatMessage[], schema: StructuredSchema<T>, _options?: LlmCallOptions): Promise<T> {
    const prompt = lastUserMessage(messages)
    this.structuredPrompts.push(prompt)
    return schema.parse(this.structured(prompt))
  }
}

function lastUserMessage(messages: ChatMessage[]): string {
  const users = messages.filter(message => message.role === 'user')
  return users.length > 0 ? users[users.length - 1].content : ''
}

export function tempDir(prefix = 'drvtriage-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix))
}
