export type TruncationReason = 'max-depth' | 'access-denied' | 'symlink-loop'
export interface TreeNode {
  readonly name: string
  readonly isDirectory: boolean
  readonly children: readonly TreeNode[]
  // Only set on directories whose children were not explored
  readonly truncated?: TruncationReason
}
export interface WalkOptions {
  showHidden?: boolean
  maxDepth?: number
}
export interface OptionContext {
  showHidden: boolean
  maxDepth?: number
  jsonOutPath: string
  pngOutPath: string
  renderImage: boolean
}
export type JsonTree = { [name: string]: JsonTree | null }
export type NodeShape = 'box' | 'ellipse'
export interface GraphNode {
  id: string
  label: string
  shape: NodeShape
}
export interface GraphEdge {
  from: string
  to: string
}
export interface TreeGraph {
  nodes: GraphNode[]
  edges: GraphEdge[]
}
