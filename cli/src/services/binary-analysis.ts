/**
 * Binary Analysis Client
 *
 * Typed facade over the IDA MCP tools. Addresses are numbers on this side and
 * hex strings on the wire.
 */

import { z } from 'zod'
import { BACKEND_TOOLS, IMPORT_PAGE_SIZE } from '../constants/app-constants'
import type { FunctionRef, ImportEntry } from '../types/analysis'
import { formatAddress, tryParseAddress } from '../utils/address'
import { withTimeout } from '../utils/concurrency'
import {
  BackendUnavailableError,
  DecompilationFailedError,
  MalformedResponseError,
  NotFoundError,
  errorMessage,
} from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'
import { McpRequestError } from './mcp-connection'
import { toolResultText, type ToolCaller } from './mcp-types'

const addressSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const address = tryParseAddress(value)
  if (address === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not an address: ${value}` })
    return z.NEVER
  }
  return address
})

const importSchema = z
  .object({
    address: addressSchema,
    imported_name: z.string().optional(),
    name: z.string().optional(),
  })
  .transform(entry => ({ address: entry.address, name: entry.imported_name ?? entry.name ?? '' }))

const importPageSchema = z.union([
  z.array(importSchema).transform(data => ({ data, nextOffset: undefined })),
  z
    .object({ data: z.array(importSchema), next_offset: z.number().nullable().optional() })
    .transform(page => ({ data: page.data, nextOffset: page.next_offset ?? null })),
])

const xrefSchema = z.object({ address: addressSchema })

const functionSchema = z.object({ address: addressSchema, name: z.string() })

const calleeSchema = z.object({ address: addressSchema, name: z.string() })

const pseudocodeSchema = z.union([
  z.string(),
  z.object({ code: z.string() }).transform(value => value.code),
  z.object({ pseudocode: z.string() }).transform(value => value.pseudocode),
])

/** A tool answered, but with an error payload */
class ToolFailure extends Error {
  constructor(readonly tool: string, message: string) {
    super(message)
    this.name = 'ToolFailure'
  }
}

export interface BinaryAnalysisClientOptions {
  /** Per-call limit; expiry is BackendUnavailable */
  timeoutMs: number
  logger?: Logger
}

export class BinaryAnalysisClient {
  private readonly logger: Logger

  constructor(
    private readonly tools: ToolCaller,
    private readonly options: BinaryAnalysisClientOptions
  ) {
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Full import table in backend order
   */
  async listImports(): Promise<ImportEntry[]> {
    const imports: ImportEntry[] = []
    let offset = 0

    for (;;) {
      const page = await this.query(
        BACKEND_TOOLS.listImports,
        { offset, count: IMPORT_PAGE_SIZE },
        importPageSchema,
        message => new BackendUnavailableError(`list_imports failed: ${message}`)
      )
      imports.push(...page.data.filter(entry => entry.name.length > 0))

      if (page.nextOffset === undefined) {
        if (page.data.length < IMPORT_PAGE_SIZE) break
        offset += page.data.length
      } else if (page.nextOffset === null || page.nextOffset <= offset) {
        break
      } else {
        offset = page.nextOffset
      }
    }

    this.logger.debug({ count: imports.length }, 'imports listed')
    return imports
  }

  /**
   * Locations that reference `address`; empty is a valid answer
   */
  async xrefsTo(address: number): Promise<number[]> {
    try {
      const xrefs = await this.query(
        BACKEND_TOOLS.xrefsTo,
        { address: formatAddress(address) },
        z.array(xrefSchema),
        message => new NotFoundError(message)
      )
      return xrefs.map(xref => xref.address)
    } catch (err) {
      if (err instanceof NotFoundError) return []
      throw err
    }
  }

  async functionContaining(address: number): Promise<FunctionRef> {
    return this.query(
      BACKEND_TOOLS.functionByAddress,
      { address: formatAddress(address) },
      functionSchema,
      message => new NotFoundError(`No function contains ${formatAddress(address)}: ${message}`)
    )
  }

  async functionByName(name: string): Promise<FunctionRef> {
    return this.query(
      BACKEND_TOOLS.functionByName,
      { name },
      functionSchema,
      message => new NotFoundError(`No function named ${name}: ${message}`)
    )
  }

  /**
   * Pseudocode of `fn`. Never returns empty text.
   */
  async decompile(fn: FunctionRef): Promise<string> {
    const failed = (message: string) =>
      new DecompilationFailedError(`Cannot decompile ${fn.name} (${formatAddress(fn.address)}): ${message}`)

    let pseudocode: string
    try {
      pseudocode = await this.query(
        BACKEND_TOOLS.decompile,
        { address: formatAddress(fn.address) },
        pseudocodeSchema,
        failed
      )
    } catch (err) {
      if (err instanceof MalformedResponseError) throw failed(err.message)
      throw err
    }

    if (!pseudocode.trim()) {
      throw failed('empty pseudocode')
    }
    return pseudocode
  }

  /**
   * Direct callees, as the backend reports them
   */
  async callees(fn: FunctionRef): Promise<FunctionRef[]> {
    return this.query(
      BACKEND_TOOLS.callees,
      { function_address: formatAddress(fn.address) },
      z.array(calleeSchema),
      message => new NotFoundError(`Callees of ${fn.name}: ${message}`)
    )
  }

  async renameLocalVariable(fn: FunctionRef, oldName: string, newName: string): Promise<void> {
    await this.invoke(
      BACKEND_TOOLS.renameLocal,
      { function_address: formatAddress(fn.address), old_name: oldName, new_name: newName },
      message => new NotFoundError(`Rename ${oldName} in ${fn.name}: ${message}`)
    )
  }

  async setFunctionPrototype(fn: FunctionRef, prototype: string): Promise<void> {
    await this.invoke(
      BACKEND_TOOLS.setPrototype,
      { function_address: formatAddress(fn.address), prototype },
      message => new NotFoundError(`Set prototype of ${fn.name}: ${message}`)
    )
  }

  /**
   * Call a tool and validate its JSON text against `schema`
   */
  private async query<S extends z.ZodTypeAny>(
    tool: string,
    args: Record<string, unknown>,
    schema: S,
    onToolError: (message: string) => Error
  ): Promise<z.output<S>> {
    const text = await this.invoke(tool, args, onToolError)

    let payload: unknown
    try {
      payload = JSON.parse(text)
    } catch {
      // Plain-text answers (pseudocode) are valid for string schemas
      payload = text
    }

    const result = schema.safeParse(payload)
    if (!result.success) {
      throw new MalformedResponseError(`Unexpected ${tool} response: ${result.error.issues[0]?.message}`, text)
    }
    return result.data
  }

  private async invoke(
    tool: string,
    args: Record<string, unknown>,
    onToolError: (message: string) => Error
  ): Promise<string> {
    this.logger.debug(args, `-> ${tool}`)

    try {
      const result = await withTimeout(
        signal => this.tools.callTool(tool, args, { signal }),
        this.options.timeoutMs,
        () => new BackendUnavailableError(`${tool} timed out after ${this.options.timeoutMs}ms`)
      )
      const text = toolResultText(result)
      if (result.isError) {
        throw new ToolFailure(tool, text || 'tool reported an error')
      }
      return text
    } catch (err) {
      if (err instanceof ToolFailure || err instanceof McpRequestError) {
        this.logger.debug(err.message, `<- ${tool} error`)
        throw onToolError(err.message)
      }
      if (err instanceof BackendUnavailableError) throw err
      throw new BackendUnavailableError(`${tool}: ${errorMessage(err)}`, { cause: err })
    }
  }
}
