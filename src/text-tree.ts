import chalk from 'chalk'
import { getTruncationMarker } from './utils'
import type { TreeNode } from './types'

const TEE = '├── '
const CORNER = '└── '
const PIPE_SEGMENT = '│   '
const BLANK_SEGMENT = '    '

function collectLines(node: TreeNode, prefix: string, lines: string[]) {
  node.children.forEach((child, index) => {
    const isLast = index === node.children.length - 1
    const marker = getTruncationMarker(child)
    const connector = isLast ? CORNER : TEE
    const suffix = marker ? `  ${marker}` : ''
    lines.push(`${prefix}${connector}${child.name}${suffix}`)
    if (child.children.length > 0) {
      const segment = isLast ? BLANK_SEGMENT : PIPE_SEGMENT
      collectLines(child, prefix + segment, lines)
    }
  })
  return lines
}

/**
 * One line per descendant of `root`; the root itself is left to the header.
 */
export function renderTextTree(root: TreeNode): string[] {
  return collectLines(root, '', [])
}

export function printTextTree(root: TreeNode, rootAbsPath: string) {
  console.log(`\n📁 ${chalk.bold.yellow(`Directory Tree: ${rootAbsPath}`)}\n`)
  const rootMarker = getTruncationMarker(root)
  if (rootMarker) {
    console.log(chalk.gray(rootMarker))
    return
  }
  const lines = renderTextTree(root)
  if (lines.length === 0) {
    console.log(chalk.gray('(empty directory)'))
    return
  }
  lines.forEach((line) => console.log(line))
}
