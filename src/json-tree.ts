import { writeFile } from 'node:fs/promises'
import { IOWriteError } from './errors'
import type { JsonTree, TreeNode } from './types'

/**
 * Maps every file to `null` and every directory to the mapping of its
 * children. The root is unwrapped: its name never appears as a key.
 */
export function serializeTree(root: TreeNode): JsonTree {
  const tree: JsonTree = {}
  for (const child of root.children) {
    // defineProperty keeps a `__proto__` entry as an own key
    Object.defineProperty(tree, child.name, {
      value: child.isDirectory ? serializeTree(child) : null,
      enumerable: true,
      writable: true,
      configurable: true,
    })
  }
  return tree
}

export async function writeJsonTree(tree: JsonTree, outPath: string) {
  const content = `${JSON.stringify(tree, null, 4)}\n`
  try {
    await writeFile(outPath, content, 'utf-8')
  } catch (err) {
    throw new IOWriteError(outPath, err)
  }
}
