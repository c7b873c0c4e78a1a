import { PolygonConstraint } from './constraints'
import { Vertex } from './geom'
import { ConstraintView, IntegrityCheck } from './integrity'
import { ConstrainedEdge, TopologyView } from './topology'

type Coords = [number, number, boolean?]

function view(vertices: Coords[], origins: number[], twins: number[], constrained: ConstrainedEdge[] = []): TopologyView {
    const keys = new Set(constrained.map(([a, b]) => `${Math.min(a, b)}:${Math.max(a, b)}`))
    return {
        vertices: vertices.map(([x, y, synthetic]) => new Vertex(x, y, 0, synthetic ?? false)),
        origins,
        twins,
        regions: new Array<number>(origins.length / 3).fill(-1),
        isConstrained: (a, b) => keys.has(`${Math.min(a, b)}:${Math.max(a, b)}`),
        constrainedEdges: () => constrained
    }
}

const noConstraints: ConstraintView = {
    constraints: [],
    getChains: () => []
}

// two triangles sharing the edge 1-2; (1.2, 1.2) lies inside the circle
// through the other three
const kite: [number, number][] = [[0, 0], [2, 0], [0, 2], [1.2, 1.2]]

test('a single triangle is valid', () => {
    const check = new IntegrityCheck(view([[0, 0], [1, 0], [0, 1]], [0, 1, 2], [-1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(true)
    expect(check.getViolations()).toEqual([])
    expect(check.getMessage()).toEqual('No violations found')
})

test('clockwise triangles are reported', () => {
    const check = new IntegrityCheck(view([[0, 0], [1, 0], [0, 1]], [0, 2, 1], [-1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toContain('triangle 0 (0, 2, 1) is clockwise')
    expect(check.getViolations()).toContain('hull is not convex at vertex 2')
    expect(check.getMessage()).toMatch(/^4 violation\(s\): /)
})

test('asymmetric twins are reported', () => {
    const check = new IntegrityCheck(view(kite, [0, 1, 2, 2, 1, 3], [-1, 3, -1, -1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toEqual(['invalid twin link: 1 -> 3 but 3 -> -1'])
})

test('out of range origins are reported', () => {
    const check = new IntegrityCheck(view([[0, 0], [1, 0], [0, 1]], [0, 1, 7], [-1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toEqual(['half-edge 2 has invalid origin 7'])
})

test('edges failing the in-circle test are reported', () => {
    const check = new IntegrityCheck(view(kite, [0, 1, 2, 2, 1, 3], [-1, 3, -1, 1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toEqual(['triangles shared by edge 1-2 are not Delaunay'])
})

test('constrained edges are exempt from the in-circle test', () => {
    const topo = view(kite, [0, 1, 2, 2, 1, 3], [-1, 3, -1, 1, -1, -1], [[0, 1, [0]], [1, 2, [0]], [2, 0, [0]]])
    const p = new PolygonConstraint(topo.vertices.slice(0, 3))
    p.complete()
    const chains = [[0, 1], [1, 2], [2, 0]]
    const check = new IntegrityCheck(topo, { constraints: [p], getChains: () => chains })
    expect(check.inspect()).toBe(true)
})

test('flags without a realized segment are reported', () => {
    const topo = view(kite, [0, 1, 2, 2, 1, 3], [-1, 3, -1, 1, -1, -1], [[1, 2, [0]]])
    const check = new IntegrityCheck(topo, noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toEqual(['edge 1:2 is flagged for constraint 0 but realizes none of its segments'])
})

test('chain vertices must lie exactly on the segment unless synthetic', () => {
    // (1, 1/3) misses the line from (0, 0) to (3, 1) by a rounding error
    const violations = (synthetic: boolean) => {
        const topo = view(
            [[0, 0], [3, 1], [1, 1 / 3, synthetic], [0, 3]],
            [0, 2, 3, 2, 1, 3],
            [-1, 5, -1, -1, -1, 1],
            [[0, 2, [0]], [1, 2, [0]], [1, 3, [0]], [0, 3, [0]]]
        )
        const p = new PolygonConstraint([topo.vertices[0], topo.vertices[1], topo.vertices[3]])
        p.complete()
        const check = new IntegrityCheck(topo, { constraints: [p], getChains: () => [[0, 2, 1], [1, 3], [3, 0]] }, 1e-5)
        check.inspect()
        return check.getViolations()
    }
    expect(violations(false)).toEqual(['vertex 2 in the chain of segment 0 of constraint 0 is not on the segment'])
    expect(violations(true)).toEqual([])
})

test('triangles sharing an edge without a link are reported', () => {
    // the same triangle twice
    const check = new IntegrityCheck(view([[0, 0], [1, 0], [0, 1]], [0, 1, 2, 0, 1, 2], [-1, -1, -1, -1, -1, -1]), noConstraints)
    expect(check.inspect()).toBe(false)
    expect(check.getViolations()).toEqual([
        'edge 0:1 is bounded by two triangles that are not linked',
        'edge 1:2 is bounded by two triangles that are not linked',
        'edge 0:2 is bounded by two triangles that are not linked'
    ])
})

test('inspection is repeatable', () => {
    const check = new IntegrityCheck(view(kite, [0, 1, 2, 2, 1, 3], [-1, 3, -1, 1, -1, -1]), noConstraints)
    const first = check.inspect()
    const violations = [...check.getViolations()]
    expect(check.inspect()).toEqual(first)
    expect(check.getViolations()).toEqual(violations)
})
