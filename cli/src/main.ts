#!/usr/bin/env node
import { APP_NAME, APP_VERSION } from './constants/app-constants'
import { formatUsage, parseScope, type ScopeConfig } from './config/scope'
import { runHeadlessMode } from './headless'
import { errorMessage, isTriageError } from './utils/errors'
import { initUserConfig } from './utils/user-config'

async function main(): Promise<number> {
  let scope: ScopeConfig
  try {
    scope = parseScope(process.argv)
  } catch (error) {
    console.error(
      JSON.stringify({ success: false, error: errorMessage(error), ...(isTriageError(error) ? { errorKind: error.kind } : {}) })
    )
    console.error(formatUsage())
    return 2
  }

  switch (scope.command) {
    case 'help':
      console.log(formatUsage())
      return 0
    case 'version':
      console.log(`${APP_NAME} ${APP_VERSION}`)
      return 0
    case 'init': {
      const { created, path } = initUserConfig()
      console.log(created ? `Created config: ${path}` : `Config already exists: ${path}`)
      return 0
    }
    default:
      return runHeadlessMode(scope)
  }
}

main().then(
  code => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error(JSON.stringify({ success: false, error: errorMessage(error) }))
    process.exitCode = 1
  }
)
