import { RenderError } from './errors'
import { getTruncationMarker } from './utils'
import type { GraphCanvas } from './graphviz-canvas'
import type { TreeGraph, TreeNode } from './types'

function addSubtree(node: TreeNode, nodeId: string, graph: TreeGraph) {
  const marker = getTruncationMarker(node)
  if (marker) {
    // no entry name is empty, so no child id can end in `//truncated`
    const markerId = `${nodeId}//truncated`
    graph.nodes.push({ id: markerId, label: marker, shape: 'ellipse' })
    graph.edges.push({ from: nodeId, to: markerId })
  }
  for (const child of node.children) {
    // sibling names are unique, so the joined path is too
    const childId = `${nodeId}/${child.name}`
    graph.nodes.push({ id: childId, label: child.name, shape: 'box' })
    graph.edges.push({ from: nodeId, to: childId })
    addSubtree(child, childId, graph)
  }
}

export function buildTreeGraph(root: TreeNode): TreeGraph {
  const graph: TreeGraph = {
    nodes: [{ id: root.name, label: root.name, shape: 'box' }],
    edges: [],
  }
  addSubtree(root, root.name, graph)
  return graph
}

export async function renderTreeImage(
  graph: TreeGraph,
  canvas: GraphCanvas,
  outPath: string
) {
  try {
    graph.nodes.forEach(({ id, label, shape }) =>
      canvas.addNode(id, label, shape)
    )
    graph.edges.forEach(({ from, to }) => canvas.addEdge(from, to))
    await canvas.renderToFile(outPath)
  } catch (err) {
    throw new RenderError(outPath, err)
  }
}
