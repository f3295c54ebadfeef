/**
 * Headless mode entry point
 * Builds the run's collaborators from config, runs one command, prints JSON
 */

import { nanoid } from 'nanoid'
import { findCommand, type CommandName } from '../constants/app-constants'
import type { ScopeConfig } from '../config/scope'
import { BinaryAnalysisClient } from '../services/binary-analysis'
import { CacheStore } from '../services/cache-store'
import { LlmClient, createLlmBackend } from '../services/llm'
import { McpConnection } from '../services/mcp-connection'
import { requireApiKey } from '../utils/api-keys'
import { ConfigError, errorMessage, isTriageError } from '../utils/errors'
import { createLogger } from '../utils/logger'
import { loadConfig, type TriageConfig } from '../utils/user-config'
import { runHeadless, type CommandContext, type HeadlessResult } from './run'

export interface HeadlessRuntime {
  ctx: CommandContext
  close(): Promise<void>
}

/**
 * Connect what `command` needs: the IDA backend, the cache, the LLM key
 */
export async function openRuntime(command: CommandName, config: TriageConfig, runId: string): Promise<HeadlessRuntime> {
  const info = findCommand(command)
  const logger = createLogger(runId, { level: config.logLevel })

  if (info.needsLlm) {
    requireApiKey(config.apiKey)
  }

  const connection = new McpConnection({
    command: config.backendExecutablePath,
    args: config.backendServerPath ? [config.backendServerPath] : [],
    requestTimeoutMs: config.backendTimeoutMs,
    logger: createLogger(`${runId}:mcp`, { level: config.logLevel }),
  })
  const cache = new CacheStore({ path: config.cachePath, logger })

  const close = async (): Promise<void> => {
    connection.stop()
    if (cache.isOpen) await cache.close()
  }

  try {
    if (info.needsBackend) {
      if (!config.backendServerPath) {
        throw new ConfigError('No MCP server script: set IDA_MCP_SERVER or "backendServerPath" in config.json')
      }
      await connection.start()
    }
    if (info.usesCache) {
      await cache.open()
    }
  } catch (err) {
    await close()
    throw err
  }

  const ctx: CommandContext = {
    config,
    client: new BinaryAnalysisClient(connection, { timeoutMs: config.backendTimeoutMs, logger }),
    llm: new LlmClient(createLlmBackend(config), { timeoutMs: config.llmTimeoutMs, logger }),
    cache,
    logger,
    runId,
  }
  return { ctx, close }
}

/**
 * Run a command in headless mode; resolves to the process exit code
 */
export async function runHeadlessMode(scope: ScopeConfig, env: Record<string, string | undefined> = process.env): Promise<number> {
  const runId = nanoid(10)
  const startTime = Date.now()

  if (scope.command === 'help' || scope.command === 'version' || scope.command === 'init') {
    throw new Error(`${scope.command} is not a headless command`)
  }
  const command = scope.command

  let runtime: HeadlessRuntime | undefined
  try {
    const config = loadConfig({ env, configPath: scope.configPath, overrides: scope.overrides })
    runtime = await openRuntime(command, config, runId)

    const result: HeadlessResult = await runHeadless(
      { command, target: scope.target, contextPath: scope.contextPath },
      runtime.ctx
    )

    // Output JSON result; failures go to stderr
    const output = JSON.stringify(result, null, 2)
    if (result.success) {
      console.log(output)
      return 0
    }
    console.error(output)
    return 1
  } catch (error) {
    const errorResult: HeadlessResult = {
      success: false,
      summary: `${command} failed`,
      command,
      runId,
      error: errorMessage(error),
      ...(isTriageError(error) ? { errorKind: error.kind } : {}),
      duration: (Date.now() - startTime) / 1000,
    }
    console.error(JSON.stringify(errorResult, null, 2))
    return 1
  } finally {
    await runtime?.close()
  }
}
