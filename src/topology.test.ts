import { Vertex } from './geom'
import { Topology, nextEdge, prevEdge } from './topology'

function square(): Topology {
    const topo = new Topology(1)
    const ids = [[0, 0], [2, 0], [2, 2], [0, 2]].map(([x, y]) => topo.addVertex(new Vertex(x, y)))
    topo.bootstrap(ids[0], ids[1], ids[2])
    const loc = topo.locate(topo.vertices[3])
    if (loc.kind !== 'outside') {
        throw new Error(`unexpected location ${loc.kind}`)
    }
    topo.extendHull(loc.edge, ids[3])
    return topo
}

function expectLinked(topo: Topology) {
    topo.twins.forEach((f, e) => {
        if (f !== -1) {
            expect(topo.twins[f]).toEqual(e)
            expect(topo.origins[f]).toEqual(topo.origins[nextEdge(e)])
        }
    })
}

test('half-edges of a triangle', () => {
    expect([nextEdge(0), nextEdge(1), nextEdge(2)]).toEqual([1, 2, 0])
    expect([prevEdge(3), prevEdge(4), prevEdge(5)]).toEqual([5, 3, 4])
})

test('point location', () => {
    const topo = square()
    expect(topo.triangleCount).toEqual(2)
    expect(topo.locate({ x: 2, y: 2 })).toEqual({ kind: 'vertex', vertex: 2 })
    expect(topo.locate({ x: 1.5, y: 0.5 }).kind).toEqual('triangle')
    expect(topo.locate({ x: 1, y: 0 }).kind).toEqual('edge')
    expect(topo.locate({ x: 3, y: 1 }).kind).toEqual('outside')
    // within the vertex tolerance
    expect(topo.locate({ x: 2, y: 2 + 1e-7 })).toEqual({ kind: 'vertex', vertex: 2 })
})

test('flipping a diagonal', () => {
    const topo = square()
    const e = topo.findEdge(0, 2)
    expect(e).not.toEqual(-1)
    expect(topo.flip(e)).toBe(true)
    expect(topo.findEdge(0, 2)).toEqual(-1)
    expect(topo.findEdge(1, 3)).not.toEqual(-1)
    expectLinked(topo)
})

test('constrained and hull edges are never flipped', () => {
    const topo = square()
    topo.markConstrained(0, 2, 0)
    const origins = [...topo.origins]
    const twins = [...topo.twins]

    expect(topo.flip(topo.findEdge(0, 2))).toBe(false)
    expect(topo.flip(topo.findEdge(0, 1))).toBe(false)
    expect(topo.origins).toEqual(origins)
    expect(topo.twins).toEqual(twins)
})

test('splitting a constrained edge keeps the flag on both halves', () => {
    const topo = square()
    topo.markConstrained(0, 2, 3)
    const p = topo.addVertex(new Vertex(1, 1))
    const { opposite, constraintIds } = topo.splitEdge(topo.findEdge(0, 2), p)

    expect(constraintIds).toEqual([3])
    expect(opposite).toHaveLength(4)
    expect(topo.triangleCount).toEqual(4)
    expect(topo.isConstrained(0, 2)).toBe(false)
    expect(topo.isConstrained(0, p)).toBe(true)
    expect(topo.isConstrained(p, 2)).toBe(true)
    expect(topo.constrainedEdges()).toHaveLength(2)
    expect(topo.neighbors(p).sort()).toEqual([0, 1, 2, 3])
    expectLinked(topo)
})

test('hull of the mesh', () => {
    const topo = square()
    expect(topo.perimeter()).toEqual([0, 1, 2, 3])
    const p = topo.addVertex(new Vertex(4, 1))
    const loc = topo.locate(topo.vertices[p])
    expect(loc.kind).toEqual('outside')
    if (loc.kind === 'outside') {
        expect(topo.extendHull(loc.edge, p)).toHaveLength(1)
    }
    expect(topo.perimeter()).toEqual([0, 1, 4, 2, 3])
    expectLinked(topo)
})
