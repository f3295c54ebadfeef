/**
 * IRP Access Analyzer
 *
 * Does the dispatch handler read, write or copy through a pointer the
 * requester controls via the IRP (SystemBuffer, UserBuffer, the stack
 * location's DeviceIoControl parameters...)?
 */

import { z } from 'zod'
import { requestStructured, tableCell } from '../services/agent-parser'
import type { ChatMessage } from '../services/llm'
import type { FunctionRef, IrpAccessFinding, IrpAccessResult, ParseOutcome } from '../types/analysis'
import { formatAddress } from '../utils/address'
import { silentLogger, type Logger } from '../utils/logger'
import { DRIVER_ANALYST_PROMPT, type AgentDeps } from './types'

// Fields that matter for requester-controlled pointers
const IRP_LAYOUT = `typedef struct _IRP {
  CSHORT Type;
  USHORT Size;
  PMDL MdlAddress;
  ULONG Flags;
  union {
    struct _IRP *MasterIrp;
    LONG IrpCount;
    PVOID SystemBuffer;
  } AssociatedIrp;
  LIST_ENTRY ThreadListEntry;
  IO_STATUS_BLOCK IoStatus;
  KPROCESSOR_MODE RequestorMode;
  /* ... */
  PIO_STATUS_BLOCK UserIosb;
  PKEVENT UserEvent;
  /* Overlay ... */
  PDRIVER_CANCEL CancelRoutine;
  PVOID UserBuffer;
  union {
    struct {
      union {
        KDEVICE_QUEUE_ENTRY DeviceQueueEntry;
        struct { PVOID DriverContext[4]; };
      };
      PETHREAD Thread;
      PCHAR AuxiliaryBuffer;
      struct {
        LIST_ENTRY ListEntry;
        union {
          struct _IO_STACK_LOCATION *CurrentStackLocation;
          ULONG PacketType;
        };
      };
      PFILE_OBJECT OriginalFileObject;
    } Overlay;
    KAPC Apc;
    PVOID CompletionKey;
  } Tail;
} IRP;`

const accessSchema = z.object({
  operation: z.string().describe('read, write, copy or the API name'),
  role: z.enum(['source', 'destination', 'other']),
  pointerSource: z.string().describe('Expression path from Irp to the pointer'),
  ioControlCode: z.string().nullable().optional(),
  note: z.string().describe('Key pseudocode evidence'),
})

const irpAccessSchema = z.object({
  controllable: z.boolean(),
  accesses: z.array(accessSchema),
})

const FALLBACK_FORMAT = `Return only a JSON object:
{
  "controllable": true,
  "accesses": [
    {"operation": "copy", "role": "destination", "pointerSource": "Irp->AssociatedIrp.SystemBuffer", "ioControlCode": "0x222004", "note": "memmove(*(void **)SystemBuffer, v5, Length);"}
  ]
}
Use {"controllable": false, "accesses": []} when no access qualifies.`

function buildMessages(fn: FunctionRef, pseudocode: string, context: string | undefined, withFormat: boolean): ChatMessage[] {
  const contextSection = context
    ? `

Context from the descriptions of its callees and earlier analysis. Rely on it for callee behaviour and do not assume anything it does not state:
${context}`
    : ''

  return [
    { role: 'system', content: DRIVER_ANALYST_PROMPT },
    {
      role: 'user',
      content: `Analyze ${fn.name} at ${formatAddress(fn.address)}: does it perform kernel memory reads or writes through pointers controlled by \`IRP *Irp\`?
1. Use this IRP layout (note AssociatedIrp.SystemBuffer):
${IRP_LAYOUT}
2. Check every memory access, copy and API call (memcpy/memmove/RtlCopyMemory/MmProbeAndLockPages, loops) and whether a source or destination pointer derives from Irp or its nested fields (Irp->AssociatedIrp.SystemBuffer, Irp->Tail.Overlay.CurrentStackLocation, Irp->UserBuffer, Irp->Tail.Overlay.DriverContext[]).
3. Follow SystemBuffer, UserBuffer, MasterIrp and CurrentStackLocation->Parameters.DeviceIoControl closely, and name the IoControlCode branch that reaches each access.
4. Only count a pointer that targets memory outside the IRP object and that the requester controls through the IRP. Accesses to the IRP's own fields do not count.
5. For each hit give the operation, the pointer role (source/destination/other), the pointer expression, the IoControlCode if known, and the evidence.

\`\`\`c
${pseudocode}
\`\`\`${contextSection}${withFormat ? `\n\n${FALLBACK_FORMAT}` : ''}`,
    },
  ]
}

export class IrpAccessAnalyzer {
  private readonly logger: Logger

  constructor(private readonly deps: AgentDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  async analyze(fn: FunctionRef, pseudocode: string, contextMarkdown?: string): Promise<ParseOutcome<IrpAccessResult>> {
    const outcome = await requestStructured({
      llm: this.deps.llm,
      purpose: `IRP access of ${fn.name}`,
      messages: buildMessages(fn, pseudocode, contextMarkdown, false),
      fallbackMessages: buildMessages(fn, pseudocode, contextMarkdown, true),
      structuredSchema: irpAccessSchema,
    })

    if (outcome.status === 'parse_failed') {
      this.logger.warn({ function: fn.name }, 'IRP access reply did not parse')
      return outcome
    }

    const accesses: IrpAccessFinding[] = outcome.value.accesses.map(access => {
      const finding: IrpAccessFinding = {
        operation: access.operation.trim(),
        role: access.role,
        pointerSource: access.pointerSource.trim(),
        note: access.note.trim(),
      }
      if (access.ioControlCode) finding.ioControlCode = access.ioControlCode.trim()
      return finding
    })

    // controllable needs at least one access
    const controllable = outcome.value.controllable && accesses.length > 0
    return { status: 'parsed', value: { controllable, accesses } }
  }
}

export function renderIrpAccess(outcome: ParseOutcome<IrpAccessResult>): string {
  if (outcome.status === 'parse_failed') {
    return '_IRP access analysis returned an unparsable reply; no findings recorded._'
  }

  const { controllable, accesses } = outcome.value
  const verdict = `- Verdict: ${controllable ? 'IRP-controlled memory access present' : 'no IRP-controlled memory access'}`
  if (accesses.length === 0) {
    return `${verdict}\n\nNo IRP-controlled memory pointer found.`
  }

  const rows = accesses.map(
    access =>
      `| ${tableCell(access.operation)} | ${access.role} | \`${tableCell(access.pointerSource)}\` | ${tableCell(access.ioControlCode ?? '-')} | ${tableCell(access.note)} |`
  )
  return [
    verdict,
    '',
    '| Operation | Role | Pointer source | IoControlCode | Note |',
    '| --- | --- | --- | --- | --- |',
    ...rows,
  ].join('\n')
}
