import { writeFile } from 'node:fs/promises'
import type { NodeShape } from './types'

export interface GraphCanvas {
  addNode(id: string, label: string, shape?: NodeShape): void
  addEdge(parentId: string, childId: string): void
  renderToFile(outPath: string): Promise<void>
}

function quote(value: string) {
  return `"${value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n')}"`
}

/**
 * Lays the graph out with Graphviz `dot` (WebAssembly build) and rasterizes
 * the resulting SVG with resvg.
 */
export class GraphvizCanvas implements GraphCanvas {
  private nodeLines: string[] = []
  private edgeLines: string[] = []

  addNode(id: string, label: string, shape: NodeShape = 'box') {
    this.nodeLines.push(
      `  ${quote(id)} [label=${quote(label)}, shape=${shape}];`
    )
  }

  addEdge(parentId: string, childId: string) {
    this.edgeLines.push(`  ${quote(parentId)} -> ${quote(childId)};`)
  }

  toDot() {
    return [
      'digraph G {',
      '  rankdir=TB;',
      ...this.nodeLines,
      ...this.edgeLines,
      '}',
      '',
    ].join('\n')
  }

  // Loaded here so a missing native binding fails this output alone
  async renderToFile(outPath: string) {
    const { Graphviz } = await import('@hpcc-js/wasm-graphviz')
    const { Resvg } = await import('@resvg/resvg-js')
    const graphviz = await Graphviz.load()
    const svg = graphviz.dot(this.toDot())
    const png = new Resvg(svg, {
      background: 'white',
      font: { loadSystemFonts: true },
    })
      .render()
      .asPng()
    await writeFile(outPath, png)
  }
}
