import chalk from 'chalk'
import packageJSON from '../package.json'
import { describeCause } from './errors'
import type { DirectoryPermissionError, TreescapeError } from './errors'

export function showAppHeader() {
  console.log(
    `\n🌳 ${chalk.bold.blue('treescape')} ${chalk.cyanBright(
      `[version: v${packageJSON.version}]`
    )}`
  )
}
export function showAccessDeniedWarning(error: DirectoryPermissionError) {
  console.error(
    chalk.yellow(`⚠️  ${error.message} Listed as an empty directory.`)
  )
}
export function showOutputSaved(kind: 'json' | 'image', outPath: string) {
  const icon = kind === 'json' ? '📄' : '🖼️'
  const what = kind === 'json' ? 'The directory tree' : 'The tree image'
  console.log(`\n${icon} ${what} has been saved as '${chalk.green(outPath)}'`)
}
export function showOutputFailed(error: TreescapeError) {
  console.error(chalk.red(`\n❌ ${describeCause(error)}`))
}
export function showFatalError(error: unknown) {
  const message =
    error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  console.error(chalk.red(`\n❌ ${message}`))
}
