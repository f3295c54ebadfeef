/**
 * Deep Reasoning Analyzer
 *
 * One closing pass over every handler's IRP access and memory parameter
 * findings, without the backend: risk scenarios per IoControlCode branch and
 * what to verify next by hand.
 */

import type { ChatMessage } from '../services/llm'
import type { FunctionRef } from '../types/analysis'
import { formatAddress } from '../utils/address'
import { silentLogger, type Logger } from '../utils/logger'
import type { AgentDeps } from './types'

const SYSTEM_PROMPT = 'You are a meticulous Windows driver analyst. Think deeply and cite evidence.'

// x64 offsets; which fields the requester can influence
const IRP_CONTROLLABILITY = `typedef struct _IRP {
  CSHORT Type;                 // 0x000 kernel
  USHORT Size;                 // 0x002 kernel
  PMDL MdlAddress;             // 0x008 pointer not controllable; mapped user buffer contents are
  ULONG Flags;                 // 0x010 kernel/driver
  union {
    struct _IRP *MasterIrp;    // 0x018 not controllable
    LONG IrpCount;             // 0x018 not controllable
    PVOID SystemBuffer;        // 0x018 contents controllable under METHOD_BUFFERED
  } AssociatedIrp;
  LIST_ENTRY ThreadListEntry;  // 0x020 kernel
  IO_STATUS_BLOCK IoStatus;    // 0x030 written by driver/kernel
  KPROCESSOR_MODE RequestorMode; // 0x040 kernel, UserMode or KernelMode
  /* 0x041-0x047 kernel bookkeeping */
  PIO_STATUS_BLOCK UserIosb;   // 0x048 pointer from the caller, controllable
  PKEVENT UserEvent;           // 0x050 from a caller handle, controllable
  union {
    struct {
      PIO_APC_ROUTINE UserApcRoutine; // 0x058 controllable
      PVOID UserApcContext;           // 0x060 controllable
    } AsynchronousParameters;
    LARGE_INTEGER AllocationSize;     // 0x058 may come straight from caller input
  } Overlay;
  PDRIVER_CANCEL CancelRoutine; // 0x068 driver
  PVOID UserBuffer;             // 0x070 pointer and contents from the caller
  union {
    struct {
      PVOID DriverContext[4];   // 0x078 driver
      PETHREAD Thread;          // 0x098 issuing thread, not controllable
      PCHAR AuxiliaryBuffer;    // 0x0A0 kernel buffer
      LIST_ENTRY ListEntry;     // 0x0A8 kernel
      PIO_STACK_LOCATION CurrentStackLocation; // 0x0B8 kernel pointer; Parameters values come from the caller
      PFILE_OBJECT OriginalFileObject;         // 0x0C0 resolved from a caller handle, pointer not controllable
    } Overlay;
    KAPC Apc;                   // 0x078 kernel
  } Tail;
} IRP;`

/** What one handler contributed to the run */
export interface HandlerFindings {
  target: FunctionRef
  /** Rendered memory parameter findings, or why there are none */
  memoryParameters: string
  /** Rendered IRP access findings, or why there are none */
  irpAccess: string
}

export interface DeepReasoningInput {
  handlers: HandlerFindings[]
  /** Memory parameter tables of every routine that has findings */
  memorySections: string[]
}

function buildMessages(input: DeepReasoningInput): ChatMessage[] {
  const handlers = input.handlers.map((handler, index) =>
    [
      `## Handler ${index + 1}: ${handler.target.name} @ ${formatAddress(handler.target.address)}`,
      '### Memory parameters',
      handler.memoryParameters,
      '### IRP-controlled access',
      handler.irpAccess,
    ].join('\n\n')
  )

  const memory = input.memorySections.length > 0 ? ['## Controllable memory parameter code', ...input.memorySections] : []

  const content = [
    `You will receive the IRP-controlled memory access analysis of ${input.handlers.length} Windows driver dispatch handler(s), produced earlier from their pseudocode. Reason further without access to the disassembler.`,
    `Tasks:
1. For each handler, summarize the reads and writes that Irp->AssociatedIrp.SystemBuffer or related fields may control.
2. Group the risk scenarios by IoControlCode branch and say whether each needs further verification.
3. List the key facts a human analyst needs for deeper analysis or exploitation.
4. Use this IRP layout and what the requester controls in it:
${IRP_CONTROLLABILITY}`,
    ...handlers,
    ...memory,
    'Output Markdown with the sections "Summary", "IoControlCode risks" and "Next checks".',
  ].join('\n\n')

  return [
    { role: 'system', content: SYSTEM_PROMPT },
    { role: 'user', content },
  ]
}

export class DeepReasoningAnalyzer {
  private readonly logger: Logger

  constructor(private readonly deps: AgentDeps) {
    this.logger = deps.logger ?? silentLogger
  }

  /**
   * Markdown reply; SummarizationFailed when the LLM fails or says nothing
   */
  async analyze(input: DeepReasoningInput): Promise<string> {
    const reply = await this.deps.llm.text(buildMessages(input), 'deep reasoning')
    this.logger.info({ handlers: input.handlers.length }, 'deep reasoning finished')
    return reply.trim()
  }
}
