#!/usr/bin/env node
import { ExitCode } from './errors'
import { createCli } from './setup-cli-options'
import { showAppHeader, showFatalError } from './show-console-print'

try {
  const cli = createCli()
  const parsedEnvArgs = cli.parse(process.argv, { run: false })
  if (!parsedEnvArgs.options.help && !parsedEnvArgs.options.version) {
    showAppHeader()
  }
  const exitCode: unknown = await cli.runMatchedCommand()
  process.exitCode = typeof exitCode === 'number' ? exitCode : ExitCode.Success
} catch (err) {
  showFatalError(err)
  process.exitCode = ExitCode.Unexpected
}
