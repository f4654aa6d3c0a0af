import path from 'node:path'
import {
  DirectoryPermissionError,
  NotADirectoryError,
  PathNotFoundError,
  getErrorCode,
} from './errors'
import { nodeFileSystem } from './fs-port'
import {
  compareEntryNames,
  getRootLabel,
  isHiddenEntryName,
  parseMaxDepth,
} from './utils'
import type { DirectoryEntry, FileSystemPort } from './fs-port'
import type { TreeNode, WalkOptions } from './types'

export interface WalkDirTreeOptions extends WalkOptions {
  fileSystem?: FileSystemPort
  onAccessDenied?: (error: DirectoryPermissionError) => void
}
interface WalkState {
  showHidden: boolean
  maxDepth?: number
  fileSystem: FileSystemPort
  onAccessDenied?: (error: DirectoryPermissionError) => void
}

const accessDeniedCodes = new Set(['EACCES', 'EPERM'])

async function walkDirectory(
  state: WalkState,
  name: string,
  dirPath: string,
  depth: number,
  // real paths of the directories above this one, root first
  ancestors: ReadonlySet<string>
): Promise<TreeNode> {
  let realDirPath: string
  let entries: DirectoryEntry[]
  try {
    // realpath needs search permission on every parent, readdir on the dir
    realDirPath = await state.fileSystem.realPath(dirPath)
    if (ancestors.has(realDirPath)) {
      return {
        name,
        isDirectory: true,
        children: [],
        truncated: 'symlink-loop',
      }
    }
    entries = await state.fileSystem.readDirectory(dirPath)
  } catch (err) {
    if (!accessDeniedCodes.has(getErrorCode(err) ?? '')) {
      throw err
    }
    state.onAccessDenied?.(new DirectoryPermissionError(dirPath, err))
    return {
      name,
      isDirectory: true,
      children: [],
      truncated: 'access-denied',
    }
  }

  const visibleEntries = entries
    .filter((entry) => state.showHidden || !isHiddenEntryName(entry.name))
    .sort((a, b) => compareEntryNames(a.name, b.name))
  const canDescend = state.maxDepth === undefined || depth < state.maxDepth
  const nextAncestors = new Set(ancestors).add(realDirPath)

  const children: TreeNode[] = []
  for (const entry of visibleEntries) {
    if (!entry.isDirectory) {
      children.push({ name: entry.name, isDirectory: false, children: [] })
    } else if (!canDescend) {
      children.push({
        name: entry.name,
        isDirectory: true,
        children: [],
        truncated: 'max-depth',
      })
    } else {
      children.push(
        await walkDirectory(
          state,
          entry.name,
          path.join(dirPath, entry.name),
          depth + 1,
          nextAncestors
        )
      )
    }
  }
  return { name, isDirectory: true, children }
}

/**
 * Builds the in-memory tree of `rootPath`.
 *
 * The root's own entries sit at depth 0, so a directory listed at depth `d`
 * is only explored while `d < maxDepth`. Unreadable directories are kept as
 * empty leaves and reported through `onAccessDenied`.
 */
export async function walkDirTree(
  rootPath: string,
  options: WalkDirTreeOptions = {}
): Promise<TreeNode> {
  const fileSystem = options.fileSystem ?? nodeFileSystem
  const rootStat = await fileSystem.statPath(rootPath)
  if (!rootStat) {
    throw new PathNotFoundError(rootPath)
  }
  if (!rootStat.isDirectory) {
    throw new NotADirectoryError(rootPath)
  }

  const state: WalkState = {
    showHidden: options.showHidden ?? false,
    maxDepth: parseMaxDepth(options.maxDepth),
    fileSystem,
    onAccessDenied: options.onAccessDenied,
  }
  return walkDirectory(state, getRootLabel(rootPath), rootPath, 0, new Set())
}
