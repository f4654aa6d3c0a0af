import path from 'node:path'
import { InvalidOptionError } from './errors'
import type { TreeNode, TruncationReason } from './types'

export function getTargetDir(dirArg: string | undefined, cwd = process.cwd()) {
  if (!dirArg) {
    throw new Error("You didn't give a directory path")
  }
  return path.resolve(cwd, dirArg)
}
export function getRootLabel(rootAbsPath: string) {
  return path.basename(rootAbsPath) || rootAbsPath
}
export function isHiddenEntryName(name: string) {
  return name.startsWith('.')
}
// Code unit order, same as a plain `sort()` without the string coercion
export function compareEntryNames(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0
}
export function parseMaxDepth(raw: unknown): number | undefined {
  if (raw === undefined || raw === null || raw === '') {
    return undefined
  }
  const maxDepth =
    typeof raw === 'number'
      ? raw
      : typeof raw === 'string' && raw.trim() !== ''
      ? Number(raw)
      : Number.NaN
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new InvalidOptionError('max-depth', raw)
  }
  return maxDepth
}

const truncationMarkers: Record<TruncationReason, string> = {
  'max-depth': '… (maximum depth reached)',
  'access-denied': '… (access denied)',
  'symlink-loop': '… (symbolic link loop)',
}
export function getTruncationMarker(node: TreeNode) {
  return node.truncated ? truncationMarkers[node.truncated] : undefined
}
