import { PassThrough } from 'stream'
import { describe, expect, it } from 'vitest'
import { BackendUnavailableError } from '../utils/errors'
import { McpConnection, McpRequestError } from './mcp-connection'

interface RpcMessage {
  id?: number
  method: string
  params?: Record<string, unknown>
}

type Reply = { result: unknown } | { error: { code: number; message: string } } | null

/**
 * Line-based JSON-RPC server on a pair of PassThrough streams
 */
function fakeServer(handle: (message: RpcMessage) => Reply) {
  const toServer = new PassThrough()
  const fromServer = new PassThrough()
  const received: RpcMessage[] = []
  let buffer = ''

  toServer.on('data', (chunk: Buffer) => {
    buffer += chunk.toString()
    const lines = buffer.split('\n')
    buffer = lines.pop() ?? ''
    for (const line of lines) {
      const message: RpcMessage = JSON.parse(line)
      received.push(message)
      if (message.id === undefined) continue
      const reply = handle(message)
      if (reply) fromServer.write(JSON.stringify({ jsonrpc: '2.0', id: message.id, ...reply }) + '\n')
    }
  })

  return { toServer, fromServer, received }
}

const initializeReply = {
  result: {
    protocolVersion: '2024-11-05',
    capabilities: { tools: {} },
    serverInfo: { name: 'ida-pro-mcp', version: '1.0.0' },
  },
}

function standardHandler(message: RpcMessage): Reply {
  switch (message.method) {
    case 'initialize':
      return initializeReply
    case 'tools/list':
      return { result: { tools: [{ name: 'list_imports' }, { name: 'decompile_function' }] } }
    case 'tools/call':
      if (message.params?.name === 'missing_tool') {
        return { error: { code: -32601, message: 'Unknown tool: missing_tool' } }
      }
      if (message.params?.name === 'hang') return null
      return { result: { content: [{ type: 'text', text: JSON.stringify(message.params?.arguments) }] } }
    default:
      return null
  }
}

describe('McpConnection', () => {
  it('performs the handshake and lists tools', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })

    await connection.attach(server.toServer, server.fromServer)

    expect(connection.status).toBe('running')
    expect(connection.serverInfo?.serverInfo.name).toBe('ida-pro-mcp')
    expect(connection.tools?.map(tool => tool.name)).toEqual(['list_imports', 'decompile_function'])
    expect(server.received.map(message => message.method)).toEqual([
      'initialize',
      'notifications/initialized',
      'tools/list',
    ])
    expect(server.received[0].params?.protocolVersion).toBe('2024-11-05')
    connection.stop()
  })

  it('routes tool calls and their results', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })
    await connection.attach(server.toServer, server.fromServer)

    const result = await connection.callTool('get_xrefs_to', { address: '0x12000' })

    expect(result.content).toEqual([{ type: 'text', text: '{"address":"0x12000"}' }])
    expect(connection.pendingCount).toBe(0)
    connection.stop()
  })

  it('skips non-JSON lines on the output stream', async () => {
    const server = fakeServer(standardHandler)
    server.fromServer.write('IDA Pro MCP server starting...\n')
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })

    await connection.attach(server.toServer, server.fromServer)

    expect(connection.status).toBe('running')
    connection.stop()
  })

  it('skips JSON lines that are not objects', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })
    await connection.attach(server.toServer, server.fromServer)

    expect(() => server.fromServer.emit('data', 'null\n42\n"ready"\n')).not.toThrow()

    const result = await connection.callTool('get_xrefs_to', { address: '0x12000' })
    expect(result.content).toEqual([{ type: 'text', text: '{"address":"0x12000"}' }])
    connection.stop()
  })

  it('surfaces JSON-RPC errors as McpRequestError', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })
    await connection.attach(server.toServer, server.fromServer)

    const call = connection.callTool('missing_tool', {})

    await expect(call).rejects.toBeInstanceOf(McpRequestError)
    await expect(call).rejects.toThrow('Unknown tool: missing_tool')
    connection.stop()
  })

  it('times out unanswered requests as BackendUnavailable', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 30 })
    await connection.attach(server.toServer, server.fromServer)

    await expect(connection.callTool('hang', {})).rejects.toThrow('MCP request timeout: tools/call')
    expect(connection.pendingCount).toBe(0)
    connection.stop()
  })

  it('rejects pending requests when stopped', async () => {
    const server = fakeServer(standardHandler)
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })
    await connection.attach(server.toServer, server.fromServer)

    const call = connection.callTool('hang', {})
    connection.stop()

    await expect(call).rejects.toThrow('Backend connection closed (tools/call)')
    await expect(connection.callTool('list_imports', {})).rejects.toBeInstanceOf(BackendUnavailableError)
  })

  it('fails the handshake with BackendUnavailable', async () => {
    const server = fakeServer(message =>
      message.method === 'initialize' ? { error: { code: -32600, message: 'unsupported protocol' } } : null
    )
    const connection = new McpConnection({ command: 'unused', requestTimeoutMs: 1000 })

    await expect(connection.attach(server.toServer, server.fromServer)).rejects.toThrow(
      'MCP initialize failed: unsupported protocol'
    )
    expect(connection.status).toBe('error')
  })
})
