import { Vertex } from './geom'
import { Mesh } from './mesh'

function randomVertices(n: number, seed: number, size = 100): Vertex[] {
    // mulberry32
    let s = seed
    const next = () => {
        s = (s + 0x6D2B79F5) | 0
        let t = Math.imul(s ^ (s >>> 15), 1 | s)
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    }
    const list: Vertex[] = []
    for (let i = 0; i < n; i++) {
        list.push(new Vertex(next() * size, next() * size, i))
    }
    return list
}

const coords = (list: readonly Vertex[]) => list.map(v => [v.x, v.y])

test('vertices queue until three of them are not collinear', () => {
    const mesh = new Mesh(1)
    mesh.insert(new Vertex(0, 0))
    mesh.insert(new Vertex(1, 0))
    mesh.insert(new Vertex(2, 0))
    expect(mesh.isBootstrapped()).toBe(false)
    expect(mesh.getVertexCount()).toEqual(3)
    expect(mesh.getTriangleCount()).toEqual(0)
    expect(mesh.getPerimeter()).toEqual([])

    mesh.insert(new Vertex(0, 1))
    expect(mesh.isBootstrapped()).toBe(true)
    expect(mesh.getVertexCount()).toEqual(4)
    // (2, 0) is collinear with the first edge and only sees the edge (1, 0)-(0, 1)
    expect(mesh.getTriangleCount()).toEqual(2)
    expect(coords(mesh.getPerimeter())).toEqual([[0, 0], [1, 0], [2, 0], [0, 1]])
    expect(mesh.getIntegrityCheck().inspect()).toBe(true)
})

test('bounds of the mesh', () => {
    const mesh = new Mesh(1)
    expect(mesh.getBounds()).toBeUndefined()
    mesh.insertAll([new Vertex(0, 0), new Vertex(2, 0), new Vertex(-1, 3)])
    const bounds = mesh.getBounds()
    expect(bounds?.min.x).toEqual(-1)
    expect(bounds?.min.y).toEqual(0)
    expect(bounds?.max.x).toEqual(2)
    expect(bounds?.max.y).toEqual(3)
})

test('coincident vertices are merged', () => {
    const mesh = new Mesh(1)
    const a = new Vertex(0, 0)
    mesh.insertAll([a, new Vertex(0, 0), new Vertex(1e-7, 0)])
    expect(mesh.getVertexCount()).toEqual(1)
    expect(mesh.getVertices()).toEqual([a])
    expect(mesh.getVertices()[0]).toBe(a)

    mesh.insertAll([new Vertex(4, 0), new Vertex(4, 4), new Vertex(0, 4)])
    expect(mesh.getVertexCount()).toEqual(4)
    expect(mesh.getTriangleCount()).toEqual(2)

    mesh.insert(a)
    mesh.insert(new Vertex(4, 4))
    // within a hundred-thousandth of the nominal spacing
    mesh.insert(new Vertex(1e-7, 0))
    mesh.insert(new Vertex(4, 4 + 1e-6))
    expect(mesh.getVertexCount()).toEqual(4)
    expect(mesh.getTriangleCount()).toEqual(2)
    expect(mesh.getVertices()[0]).toBe(a)
    expect(mesh.getIntegrityCheck().inspect()).toBe(true)
})

test('vertices outside the hull extend it', () => {
    const mesh = new Mesh(1)
    mesh.insertAll([new Vertex(0, 0), new Vertex(1, 0), new Vertex(0, 1)])
    mesh.insert(new Vertex(5, 5))
    mesh.insert(new Vertex(-3, -2))
    expect(mesh.getVertexCount()).toEqual(5)
    // 2n - h - 2 triangles, (0, 0) ends up inside the hull of the other four
    expect(mesh.getTriangleCount()).toEqual(4)
    expect(mesh.getPerimeter()).toHaveLength(4)
    expect(mesh.getIntegrityCheck().inspect()).toBe(true)
})

test('vertex on an edge splits it', () => {
    const mesh = new Mesh(1)
    mesh.insertAll([new Vertex(0, 0), new Vertex(4, 0), new Vertex(4, 4), new Vertex(0, 4)])
    mesh.insert(new Vertex(2, 0))
    expect(mesh.getTriangleCount()).toEqual(3)
    mesh.insert(new Vertex(2, 2))
    expect(mesh.getVertexCount()).toEqual(6)
    expect(mesh.getTriangleCount()).toEqual(5)
    expect(mesh.getIntegrityCheck().inspect()).toBe(true)
})

test('regular grid keeps its cocircular diagonals', () => {
    const n = 6
    const mesh = new Mesh(1)
    for (let j = 0; j < n; j++) {
        for (let i = 0; i < n; i++) {
            mesh.insert(new Vertex(i, j))
        }
    }
    expect(mesh.getVertexCount()).toEqual(n * n)
    expect(mesh.getTriangleCount()).toEqual(2 * (n - 1) * (n - 1))
    const check = mesh.getIntegrityCheck()
    expect(check.inspect()).toBe(true)
    expect(check.getMessage()).toEqual('No violations found')
})

test('random vertices give a Delaunay triangulation', () => {
    const mesh = new Mesh(1)
    mesh.insertAll(randomVertices(300, 42))
    expect(mesh.getVertexCount()).toEqual(300)
    const hull = mesh.getPerimeter().length
    expect(mesh.getTriangleCount()).toEqual(2 * 300 - hull - 2)
    const check = mesh.getIntegrityCheck()
    expect(check.inspect()).toBe(true)
    expect(check.getViolations()).toEqual([])
})

test('insertion order does not change the triangle count', () => {
    const list = randomVertices(100, 7)
    const forward = new Mesh(1)
    forward.insertAll(list)
    const backward = new Mesh(1)
    backward.insertAll([...list].reverse())
    expect(backward.getTriangleCount()).toEqual(forward.getTriangleCount())
    expect(backward.getIntegrityCheck().inspect()).toBe(true)
})

test('invalid input is rejected', () => {
    expect(() => new Mesh(0)).toThrow('nominalPointSpacing must be a positive number, got 0')
    expect(() => new Mesh(Number.NaN)).toThrow(/positive number/)

    const mesh = new Mesh(1)
    mesh.insertAll([new Vertex(0, 0), new Vertex(1, 0), new Vertex(0, 1)])
    expect(() => mesh.insert(new Vertex(Number.NaN, 0))).toThrow(/non-finite/)
    expect(() => mesh.insert(new Vertex(0, Number.POSITIVE_INFINITY))).toThrow(/non-finite/)
    expect(mesh.getVertexCount()).toEqual(3)
    expect(mesh.getTriangleCount()).toEqual(1)
})

test('verbose meshes log their timings', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    try {
        new Mesh(1).insertAll([new Vertex(0, 0)])
        expect(log).not.toHaveBeenCalled()

        new Mesh(1, { verbose: true }).insertAll([new Vertex(0, 0), new Vertex(1, 0), new Vertex(0, 1)])
        expect(log).toHaveBeenCalledTimes(1)
        expect(log.mock.calls[0][0]).toMatch(/^Inserted 3 vertices in \d+\.\d\d ms\.$/)
    }
    finally {
        log.mockRestore()
    }
})
