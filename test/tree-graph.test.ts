import os from 'node:os'
import path from 'node:path'
import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { describe, expect, it } from 'vitest'
import { RenderError } from '../src/errors'
import { GraphvizCanvas } from '../src/graphviz-canvas'
import { buildTreeGraph, renderTreeImage } from '../src/tree-graph'
import { cutDir, dir, file } from './helpers/tree-nodes'
import type { GraphCanvas } from '../src/graphviz-canvas'
import type { NodeShape } from '../src/types'

class RecordingCanvas implements GraphCanvas {
  nodes: [string, string, NodeShape | undefined][] = []
  edges: [string, string][] = []
  renderedTo?: string

  addNode(id: string, label: string, shape?: NodeShape) {
    this.nodes.push([id, label, shape])
  }
  addEdge(parentId: string, childId: string) {
    this.edges.push([parentId, childId])
  }
  async renderToFile(outPath: string) {
    this.renderedTo = outPath
  }
}

describe('buildTreeGraph', () => {
  it('turns every entry into a node and every parent link into an edge', () => {
    const graph = buildTreeGraph(
      dir('x', [file('a.txt'), dir('b', [file('c.txt')])])
    )

    expect(graph).toEqual({
      nodes: [
        { id: 'x', label: 'x', shape: 'box' },
        { id: 'x/a.txt', label: 'a.txt', shape: 'box' },
        { id: 'x/b', label: 'b', shape: 'box' },
        { id: 'x/b/c.txt', label: 'c.txt', shape: 'box' },
      ],
      edges: [
        { from: 'x', to: 'x/a.txt' },
        { from: 'x', to: 'x/b' },
        { from: 'x/b', to: 'x/b/c.txt' },
      ],
    })
  })

  it('gives same-named entries in different directories distinct ids', () => {
    const graph = buildTreeGraph(
      dir('x', [dir('a', [file('README')]), dir('b', [file('README')])])
    )
    const readmeIds = graph.nodes
      .filter((node) => node.label === 'README')
      .map((node) => node.id)

    expect(readmeIds).toEqual(['x/a/README', 'x/b/README'])
    expect(new Set(graph.nodes.map((node) => node.id)).size).toBe(
      graph.nodes.length
    )
  })

  it('hangs a marker node under truncated directories', () => {
    const graph = buildTreeGraph(
      dir('x', [cutDir('b', 'max-depth')])
    )

    expect(graph.nodes).toContainEqual({
      id: 'x/b//truncated',
      label: '… (maximum depth reached)',
      shape: 'ellipse',
    })
    expect(graph.edges).toContainEqual({ from: 'x/b', to: 'x/b//truncated' })
  })
})

describe('renderTreeImage', () => {
  it('hands the graph to the canvas and renders it', async () => {
    const canvas = new RecordingCanvas()
    const graph = buildTreeGraph(dir('x', [file('a.txt')]))

    await renderTreeImage(graph, canvas, '/tmp/out.png')

    expect(canvas.nodes).toEqual([
      ['x', 'x', 'box'],
      ['x/a.txt', 'a.txt', 'box'],
    ])
    expect(canvas.edges).toEqual([['x', 'x/a.txt']])
    expect(canvas.renderedTo).toBe('/tmp/out.png')
  })

  it('wraps canvas failures in RenderError', async () => {
    const layoutFailure = new Error('layout failed')
    const canvas = new RecordingCanvas()
    canvas.renderToFile = async () => {
      throw layoutFailure
    }

    const error = await renderTreeImage(
      buildTreeGraph(dir('x', [])),
      canvas,
      '/tmp/out.png'
    ).catch((err: unknown) => err)

    expect(error).toBeInstanceOf(RenderError)
    expect(error).toMatchObject({ path: '/tmp/out.png', cause: layoutFailure })
  })
})

describe('GraphvizCanvas', () => {
  it('writes a top-to-bottom digraph', () => {
    const canvas = new GraphvizCanvas()
    canvas.addNode('x', 'x')
    canvas.addNode('x/b', 'b')
    canvas.addNode('x/b//truncated', '… (maximum depth reached)', 'ellipse')
    canvas.addEdge('x', 'x/b')
    canvas.addEdge('x/b', 'x/b//truncated')

    expect(canvas.toDot()).toBe(
      [
        'digraph G {',
        '  rankdir=TB;',
        '  "x" [label="x", shape=box];',
        '  "x/b" [label="b", shape=box];',
        '  "x/b//truncated" ' +
          '[label="… (maximum depth reached)", shape=ellipse];',
        '  "x" -> "x/b";',
        '  "x/b" -> "x/b//truncated";',
        '}',
        '',
      ].join('\n')
    )
  })

  it('escapes quotes and backslashes in ids and labels', () => {
    const canvas = new GraphvizCanvas()
    canvas.addNode('x/say "hi"\\', 'say "hi"\\')

    expect(canvas.toDot()).toContain(
      '  "x/say \\"hi\\"\\\\" [label="say \\"hi\\"\\\\", shape=box];'
    )
  })

  it('renders the graph to a PNG file', async () => {
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'treescape-png-'))
    const outPath = path.join(workDir, 'directory_tree.png')
    const canvas = new GraphvizCanvas()
    canvas.addNode('x', 'x')
    canvas.addNode('x/a', 'a')
    canvas.addEdge('x', 'x/a')

    try {
      await canvas.renderToFile(outPath)
      const png = await readFile(outPath)
      expect(png.subarray(0, 8)).toEqual(
        Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])
      )
    } finally {
      await rm(workDir, { recursive: true, force: true })
    }
  })
})
