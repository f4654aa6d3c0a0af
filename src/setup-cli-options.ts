import path from 'node:path'
import cac from 'cac'
import packageJSON from '../package.json'
import { runTreescape } from './run'
import { getTargetDir, parseMaxDepth } from './utils'
import type { OptionContext } from './types'

export const JSON_OUTPUT_FILE = 'directory_tree.json'
export const PNG_OUTPUT_FILE = 'directory_tree.png'

interface RawOptions {
  showHidden?: unknown
  maxDepth?: unknown
  jsonOut?: unknown
  pngOut?: unknown
  image?: unknown
}

const optionsDefMap: Record<keyof RawOptions, string[]> = {
  showHidden: ['show-hidden', 'showHidden'],
  maxDepth: ['max-depth', 'maxDepth'],
  jsonOut: ['json-out', 'jsonOut'],
  pngOut: ['png-out', 'pngOut'],
  image: ['image'],
}
const createDefaultOptionsContext = (rootAbsPath: string): OptionContext => {
  return {
    showHidden: false,
    maxDepth: undefined,
    jsonOutPath: path.join(rootAbsPath, JSON_OUTPUT_FILE),
    pngOutPath: path.join(rootAbsPath, PNG_OUTPUT_FILE),
    renderImage: true,
  }
}

// mri turns numeric-looking values into numbers
function toOutPath(value: unknown, cwd: string) {
  if (typeof value === 'string' || typeof value === 'number') {
    const outPath = String(value)
    return outPath ? path.resolve(cwd, outPath) : undefined
  }
  return undefined
}

export function getCliOptionsContext(
  parsedOptions: Record<string, unknown>,
  rootAbsPath: string,
  cwd = process.cwd()
): OptionContext {
  const optionsContext = createDefaultOptionsContext(rootAbsPath)
  const rawOptions: RawOptions = {}
  Object.entries(parsedOptions).forEach(([cliOptionKey, cliOptionValue]) => {
    Object.entries(optionsDefMap).forEach(
      ([cliOptionDefKey, cliOptionDefKeys]) => {
        if (cliOptionDefKeys.includes(cliOptionKey)) {
          Reflect.set(rawOptions, cliOptionDefKey, cliOptionValue)
        }
      }
    )
  })

  return {
    showHidden: rawOptions.showHidden === true || optionsContext.showHidden,
    maxDepth: parseMaxDepth(rawOptions.maxDepth) ?? optionsContext.maxDepth,
    jsonOutPath:
      toOutPath(rawOptions.jsonOut, cwd) ?? optionsContext.jsonOutPath,
    pngOutPath: toOutPath(rawOptions.pngOut, cwd) ?? optionsContext.pngOutPath,
    renderImage:
      rawOptions.image === false ? false : optionsContext.renderImage,
  }
}

export function createCli() {
  const cli = cac('treescape')
  cli
    .command(
      '<directory>',
      'Print a directory tree, save it as JSON and draw it as a PNG image'
    )
    .option('--show-hidden', 'Show hidden files and directories', {
      default: false,
    })
    .option(
      '--max-depth <depth>',
      'Maximum depth to explore (no limit by default)'
    )
    .option(
      '--json-out <file>',
      `JSON output path (default: <directory>/${JSON_OUTPUT_FILE})`
    )
    .option(
      '--png-out <file>',
      `PNG output path (default: <directory>/${PNG_OUTPUT_FILE})`
    )
    .option('--no-image', 'Skip drawing the PNG image')
    .action((directory: string, options: Record<string, unknown>) => {
      const rootAbsPath = getTargetDir(directory)
      return runTreescape(
        rootAbsPath,
        getCliOptionsContext(options, rootAbsPath)
      )
    })
  cli.help()
  cli.version(packageJSON.version)
  return cli
}
