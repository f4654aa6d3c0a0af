import ora from 'ora'
import chalk from 'chalk'
import {
  ExitCode,
  IOWriteError,
  NotADirectoryError,
  PathNotFoundError,
  RenderError,
} from './errors'
import { GraphvizCanvas } from './graphviz-canvas'
import { serializeTree, writeJsonTree } from './json-tree'
import {
  showAccessDeniedWarning,
  showFatalError,
  showOutputFailed,
  showOutputSaved,
} from './show-console-print'
import { printTextTree } from './text-tree'
import { buildTreeGraph, renderTreeImage } from './tree-graph'
import { walkDirTree } from './walk-dir-tree'
import type { FileSystemPort } from './fs-port'
import type { GraphCanvas } from './graphviz-canvas'
import type { OptionContext, TreeNode } from './types'

export interface RunDeps {
  fileSystem?: FileSystemPort
  createCanvas?: () => GraphCanvas
}

async function saveJson(root: TreeNode, outPath: string) {
  try {
    await writeJsonTree(serializeTree(root), outPath)
    showOutputSaved('json', outPath)
    return true
  } catch (err) {
    if (!(err instanceof IOWriteError)) throw err
    showOutputFailed(err)
    return false
  }
}

async function saveImage(root: TreeNode, outPath: string, canvas: GraphCanvas) {
  const spinner = ora(chalk.yellow('Rendering tree image ...')).start()
  try {
    await renderTreeImage(buildTreeGraph(root), canvas, outPath)
    spinner.succeed(chalk.yellow('Tree image rendered.'))
    showOutputSaved('image', outPath)
    return true
  } catch (err) {
    spinner.fail(chalk.yellow('Tree image rendering failed.'))
    if (!(err instanceof RenderError)) throw err
    showOutputFailed(err)
    return false
  }
}

/**
 * Walks `rootAbsPath` once, then prints the text tree, writes the JSON file
 * and draws the image. A failing output never stops the ones after it.
 */
export async function runTreescape(
  rootAbsPath: string,
  options: OptionContext,
  deps: RunDeps = {}
): Promise<ExitCode> {
  let root: TreeNode
  try {
    root = await walkDirTree(rootAbsPath, {
      showHidden: options.showHidden,
      maxDepth: options.maxDepth,
      fileSystem: deps.fileSystem,
      onAccessDenied: showAccessDeniedWarning,
    })
  } catch (err) {
    if (err instanceof PathNotFoundError || err instanceof NotADirectoryError) {
      showFatalError(err)
      return ExitCode.InvalidRoot
    }
    throw err
  }

  printTextTree(root, rootAbsPath)

  const jsonSaved = await saveJson(root, options.jsonOutPath)
  const imageSaved = options.renderImage
    ? await saveImage(
        root,
        options.pngOutPath,
        deps.createCanvas?.() ?? new GraphvizCanvas()
      )
    : true

  if (!jsonSaved && !imageSaved) return ExitCode.OutputsFailed
  if (!jsonSaved) return ExitCode.JsonWriteFailed
  if (!imageSaved) return ExitCode.ImageRenderFailed
  return ExitCode.Success
}
