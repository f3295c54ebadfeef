/**
 * Dispatch Resolver
 *
 * Finds the handler a driver routine stores into DriverObject->MajorFunction[slot].
 * The pseudocode is matched syntactically first; the LLM is asked only when
 * no assignment is recognized.
 */

import { z } from 'zod'
import { requestStructured } from '../services/agent-parser'
import type { BinaryAnalysisClient } from '../services/binary-analysis'
import type { ChatMessage } from '../services/llm'
import type { FunctionRef } from '../types/analysis'
import { IRP_MJ_DEVICE_CONTROL, MAJOR_FUNCTION_OFFSET, POINTER_SIZE } from '../constants/app-constants'
import { addressFromPlaceholderName, formatAddress, tryParseAddress } from '../utils/address'
import { DispatchNotResolvedError, isTriageError } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'
import { DRIVER_ANALYST_PROMPT, type AgentDeps } from './types'

export type ResolutionMethod = 'pattern' | 'llm'

export interface DispatchResolution {
  caller: FunctionRef
  target: FunctionRef
  method: ResolutionMethod
}

const IDENT = '[A-Za-z_][\\w@$?]*'
// Optional "(PDRIVER_DISPATCH)" style cast and address-of before the handler
const HANDLER = `(?:\\(\\s*[\\w\\s*]+\\)\\s*)?&?\\s*(${IDENT})\\s*;`

function slotPatterns(slot: number): RegExp[] {
  const indexes = [String(slot), `0x${slot.toString(16)}`]
  if (slot === IRP_MJ_DEVICE_CONTROL) indexes.push('IRP_MJ_DEVICE_CONTROL')
  const indexAlt = indexes.map(index => index.replace(/x/, '[xX]')).join('|')

  // Raw stores are told apart by the width of the cast: at 0x70 an x64
  // driver object holds MajorFunction[0], not the x86 slot 14
  const offsetPatterns = (['x64', 'x86'] as const).map(arch => {
    const offset = MAJOR_FUNCTION_OFFSET[arch] + slot * POINTER_SIZE[arch]
    const offsetAlt = `${offset}|0[xX]${offset.toString(16)}`
    const width = arch === 'x64' ? '(?:_QWORD|__int64)' : '_DWORD'
    return new RegExp(
      `\\*\\s*\\(\\s*${width}\\s*\\*\\s*\\)\\s*\\(\\s*${IDENT}\\s*\\+\\s*(?:${offsetAlt})\\s*\\)\\s*=\\s*${HANDLER}`,
      'gi'
    )
  })

  return [new RegExp(`MajorFunction\\s*\\[\\s*(?:${indexAlt})\\s*\\]\\s*=\\s*${HANDLER}`, 'gi'), ...offsetPatterns]
}

/**
 * Name of the last handler assigned to `slot`, or null
 */
export function matchDispatchAssignment(pseudocode: string, slot: number = IRP_MJ_DEVICE_CONTROL): string | null {
  let best: { index: number; name: string } | null = null

  for (const pattern of slotPatterns(slot)) {
    for (const match of pseudocode.matchAll(pattern)) {
      const index = match.index ?? 0
      if (!best || index > best.index) {
        best = { index, name: match[1] }
      }
    }
  }

  return best?.name ?? null
}

const llmReplySchema = z.object({
  address: z.string().nullable(),
  func_name: z.string().nullable(),
})

function buildMessages(caller: FunctionRef, pseudocode: string, slot: number): ChatMessage[] {
  return [
    { role: 'system', content: DRIVER_ANALYST_PROMPT },
    {
      role: 'user',
      content: `In ${caller.name} at ${formatAddress(caller.address)}, find the call to IoCreateDevice and its DriverObject argument.
Determine the handler assigned to DriverObject->MajorFunction[${slot}] (it may appear as a raw offset store) and return its address and name.
Return only a JSON object such as {"address":"0x140001830","func_name":"sub_140001830"}, or {"address":null,"func_name":null} if there is no such assignment.

\`\`\`c
${pseudocode}
\`\`\``,
    },
  ]
}

export interface DispatchResolverDeps extends AgentDeps {
  client: BinaryAnalysisClient
  /** MajorFunction index; IRP_MJ_DEVICE_CONTROL by default */
  slot?: number
}

export class DispatchResolver {
  private readonly logger: Logger
  private readonly slot: number

  constructor(private readonly deps: DispatchResolverDeps) {
    this.logger = deps.logger ?? silentLogger
    this.slot = deps.slot ?? IRP_MJ_DEVICE_CONTROL
  }

  async resolve(caller: FunctionRef, pseudocode: string): Promise<DispatchResolution> {
    const matched = matchDispatchAssignment(pseudocode, this.slot)
    if (matched) {
      const target = await this.resolveName(caller, matched)
      this.logger.debug({ caller: caller.name, target: target.name }, 'dispatch matched in pseudocode')
      return { caller, target, method: 'pattern' }
    }

    const outcome = await requestStructured({
      llm: this.deps.llm,
      purpose: `dispatch target of ${caller.name}`,
      messages: buildMessages(caller, pseudocode, this.slot),
      structuredSchema: llmReplySchema,
    })
    if (outcome.status === 'parse_failed') {
      throw new DispatchNotResolvedError(`${caller.name}: unparsable dispatch reply`)
    }

    const { address, func_name: name } = outcome.value
    const parsedAddress = address === null ? null : tryParseAddress(address)
    if (parsedAddress !== null) {
      const target = { address: parsedAddress, name: name || `sub_${parsedAddress.toString(16).toUpperCase()}` }
      return { caller, target, method: 'llm' }
    }
    if (name) {
      return { caller, target: await this.resolveName(caller, name), method: 'llm' }
    }

    throw new DispatchNotResolvedError(`${caller.name} assigns no MajorFunction[${this.slot}] handler`)
  }

  private async resolveName(caller: FunctionRef, name: string): Promise<FunctionRef> {
    const placeholder = addressFromPlaceholderName(name)
    if (placeholder !== null) {
      return { address: placeholder, name }
    }

    try {
      return await this.deps.client.functionByName(name)
    } catch (err) {
      if (isTriageError(err, 'NotFound')) {
        throw new DispatchNotResolvedError(`${caller.name}: handler ${name} not found in the database`, { cause: err })
      }
      throw err
    }
  }
}
