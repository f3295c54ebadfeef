/**
 * Dispatch Annotator
 *
 * Writes back to the IDA database: names the IoControlCode local of a
 * dispatch handler and applies the DriverDispatch prototype.
 */

import type { BinaryAnalysisClient } from '../services/binary-analysis'
import type { FunctionRef } from '../types/analysis'
import { DISPATCH_PROTOTYPE, IO_CONTROL_CODE_NAME } from '../constants/app-constants'
import { errorMessage, isFatal } from '../utils/errors'
import { silentLogger, type Logger } from '../utils/logger'

const IO_CONTROL_CODE_SOURCES = [
  /\b([A-Za-z_]\w*)\s*=\s*[^;=]*Parameters\.DeviceIoControl\.IoControlCode\s*;/,
  /\b([A-Za-z_]\w*)\s*=\s*[^;=]*Parameters\.Read\.ByteOffset\.LowPart\s*;/,
]

/**
 * Local that receives the request's IoControlCode, or null
 */
export function findIoControlCodeLocal(pseudocode: string): string | null {
  for (const pattern of IO_CONTROL_CODE_SOURCES) {
    const match = pattern.exec(pseudocode)
    if (match) return match[1]
  }
  return null
}

export interface AnnotationResult {
  /** Previous local name, when a rename was applied */
  renamedFrom?: string
  prototypeSet: boolean
  notes: string[]
}

export interface DispatchAnnotatorDeps {
  client: BinaryAnalysisClient
  logger?: Logger
}

export class DispatchAnnotator {
  private readonly logger: Logger

  constructor(private readonly deps: DispatchAnnotatorDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  /**
   * Failures other than a lost backend become notes
   */
  async annotate(handler: FunctionRef, pseudocode: string): Promise<AnnotationResult> {
    const result: AnnotationResult = { prototypeSet: false, notes: [] }

    const local = findIoControlCodeLocal(pseudocode)
    if (!local) {
      result.notes.push('No IoControlCode local found; variable left unnamed.')
    } else if (local !== IO_CONTROL_CODE_NAME) {
      try {
        await this.deps.client.renameLocalVariable(handler, local, IO_CONTROL_CODE_NAME)
        result.renamedFrom = local
        result.notes.push(`Renamed local \`${local}\` to \`${IO_CONTROL_CODE_NAME}\`.`)
      } catch (err) {
        if (isFatal(err)) throw err
        result.notes.push(`Rename of \`${local}\` failed: ${errorMessage(err)}`)
      }
    }

    try {
      await this.deps.client.setFunctionPrototype(handler, DISPATCH_PROTOTYPE)
      result.prototypeSet = true
      result.notes.push(`Prototype set to \`${DISPATCH_PROTOTYPE}\``)
    } catch (err) {
      if (isFatal(err)) throw err
      result.notes.push(`Setting the prototype failed: ${errorMessage(err)}`)
    }

    this.logger.debug({ handler: handler.name, ...result }, 'dispatch annotated')
    return result
  }
}
