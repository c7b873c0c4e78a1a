// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { Vertex, XY, isQuadConvex, orient, sqDistance } from './geom'

// Triangle t owns the half-edges 3t, 3t+1 and 3t+2. The half-edge 3t+k goes
// from the k-th vertex of t to the next one, counter-clockwise.

export function nextEdge(e: number): number { return (e % 3 === 2) ? e - 2 : e + 1 }
export function prevEdge(e: number): number { return (e % 3 === 0) ? e + 2 : e - 1 }

export function edgeKey(a: number, b: number): string {
    return a < b ? `${a}:${b}` : `${b}:${a}`
}

/**
 * Where a point falls in the mesh. `outside` carries a hull half-edge that
 * has the point strictly on its right.
 */
export type Location =
    | { kind: 'vertex', vertex: number }
    | { kind: 'edge', edge: number }
    | { kind: 'triangle', triangle: number }
    | { kind: 'outside', edge: number }

export type ConstrainedEdge = [number, number, readonly number[]]

/**
 * Read access to the mesh arrays, as consumed by the collector and the
 * integrity check.
 */
export interface TopologyView {
    readonly vertices: readonly Vertex[]
    readonly origins: readonly number[]
    readonly twins: readonly number[]
    readonly regions: readonly number[]
    isConstrained(a: number, b: number): boolean
    constrainedEdges(): ConstrainedEdge[]
}

export class Topology implements TopologyView {
    readonly vertices: Vertex[] = []
    readonly origins: number[] = []
    readonly twins: number[] = []
    readonly regions: number[] = []
    readonly vertexTolerance: number

    private vert_to_edge: number[] = []
    private con_edge = new Map<string, number[]>()
    private index = new Map<Vertex, number>()
    private lastTriangle = 0
    private walkSeed = 0

    constructor(nominalPointSpacing: number) {
        this.vertexTolerance = nominalPointSpacing * 1.0e-5
    }

    get triangleCount(): number {
        return this.origins.length / 3
    }

    get isBootstrapped(): boolean {
        return this.origins.length > 0
    }

    // -----------------------------------------------------------------------
    // vertices

    addVertex(v: Vertex): number {
        const i = this.vertices.length
        this.vertices.push(v)
        this.vert_to_edge.push(-1)
        this.index.set(v, i)
        return i
    }

    /**
     * Record `v` as a second name for the mesh vertex `i`.
     */
    alias(v: Vertex, i: number): void {
        this.index.set(v, i)
    }

    indexOf(v: Vertex): number | undefined {
        return this.index.get(v)
    }

    dest(e: number): number {
        return this.origins[nextEdge(e)]
    }

    /** The vertex facing the half-edge e in its triangle */
    apex(e: number): number {
        return this.origins[prevEdge(e)]
    }

    triangleVertices(t: number): [number, number, number] {
        return [this.origins[3 * t], this.origins[3 * t + 1], this.origins[3 * t + 2]]
    }

    // -----------------------------------------------------------------------
    // constrained edges

    isConstrained(a: number, b: number): boolean {
        return this.con_edge.has(edgeKey(a, b))
    }

    markConstrained(a: number, b: number, constraintIndex: number): void {
        const key = edgeKey(a, b)
        const ids = this.con_edge.get(key)
        if (ids === undefined) {
            this.con_edge.set(key, [constraintIndex])
        }
        else if (!ids.includes(constraintIndex)) {
            ids.push(constraintIndex)
        }
    }

    constrainedEdges(): ConstrainedEdge[] {
        const list: ConstrainedEdge[] = []
        this.con_edge.forEach((ids, key) => {
            const [a, b] = key.split(':').map(Number)
            list.push([a, b, ids])
        })
        return list
    }

    // -----------------------------------------------------------------------
    // navigation

    /**
     * All half-edges leaving vertex a, rotating counter-clockwise first and,
     * when a sits on the hull, clockwise from the start as well.
     */
    outgoing(a: number): number[] {
        const start = this.vert_to_edge[a]
        const out: number[] = []
        if (start === undefined || start === -1) {
            return out
        }

        const guard = this.origins.length
        let e = start
        for (let i = 0; i < guard; i++) {
            out.push(e)
            const t = this.twins[prevEdge(e)]
            if (t === start) {
                return out
            }
            if (t === -1) {
                break
            }
            e = t
        }

        e = start
        for (let i = 0; i < guard; i++) {
            const t = this.twins[e]
            if (t === -1) {
                break
            }
            e = nextEdge(t)
            if (e === start) {
                break
            }
            out.push(e)
        }
        return out
    }

    /**
     * A half-edge of the undirected edge a-b (a -> b when it exists), or -1.
     */
    findEdge(a: number, b: number): number {
        let reverse = -1
        for (const e of this.outgoing(a)) {
            if (this.dest(e) === b) {
                return e
            }
            if (this.origins[prevEdge(e)] === b) {
                reverse = prevEdge(e)
            }
        }
        return reverse
    }

    /**
     * The half-edge a -> b, or -1 when the edge is absent or only b -> a exists.
     */
    directedEdge(a: number, b: number): number {
        for (const e of this.outgoing(a)) {
            if (this.dest(e) === b) {
                return e
            }
        }
        return -1
    }

    /** Vertex indices adjacent to a */
    neighbors(a: number): number[] {
        const list: number[] = []
        for (const e of this.outgoing(a)) {
            list.push(this.dest(e))
            const p = this.origins[prevEdge(e)]
            if (this.twins[prevEdge(e)] === -1) {
                list.push(p)
            }
        }
        return list
    }

    nextHull(h: number): number {
        let e = nextEdge(h)
        while (this.twins[e] !== -1) {
            e = nextEdge(this.twins[e])
        }
        return e
    }

    prevHull(h: number): number {
        let e = prevEdge(h)
        while (this.twins[e] !== -1) {
            e = prevEdge(this.twins[e])
        }
        return e
    }

    /** Hull vertices in counter-clockwise order */
    perimeter(): number[] {
        let start = -1
        for (let e = 0; e < this.twins.length; e++) {
            if (this.twins[e] === -1) {
                start = e
                break
            }
        }
        const ring: number[] = []
        if (start === -1) {
            return ring
        }
        let h = start
        do {
            ring.push(this.origins[h])
            h = this.nextHull(h)
        } while (h !== start && ring.length <= this.vertices.length)
        return ring
    }

    // -----------------------------------------------------------------------
    // point location

    /**
     * Visibility walk from the last touched triangle. The first edge tried
     * rotates on every step so that the walk cannot cycle forever on a
     * constrained (non-Delaunay) triangulation; a linear scan takes over if
     * the hop budget runs out.
     */
    locate(p: XY, remember = true): Location {
        const nTri = this.triangleCount
        if (nTri === 0) {
            throw new Error('Cannot locate a point before the mesh is bootstrapped')
        }

        let t = this.lastTriangle < nTri ? this.lastTriangle : 0
        const max_hops = 3 * nTri + 16

        for (let nhops = 0; nhops < max_hops; nhops++) {
            const base = 3 * t
            const v = this.vertices
            const orients = [
                orient(v[this.origins[base]], v[this.origins[base + 1]], p),
                orient(v[this.origins[base + 1]], v[this.origins[base + 2]], p),
                orient(v[this.origins[base + 2]], v[this.origins[base]], p)
            ]

            const seed = this.walkSeed
            this.walkSeed = (this.walkSeed + 1) % 3

            let next = -1
            for (let j = 0; j < 3; j++) {
                const k = (seed + j) % 3
                if (orients[k] < 0) {
                    const e = base + k
                    if (this.twins[e] === -1) {
                        if (remember) {
                            this.lastTriangle = t
                        }
                        return this.snap({ kind: 'outside', edge: e }, p)
                    }
                    next = Math.floor(this.twins[e] / 3)
                    break
                }
            }

            if (next === -1) {
                if (remember) {
                    this.lastTriangle = t
                }
                return this.snap(this.classify(t, orients, p), p)
            }
            t = next
        }

        return this.scan(p)
    }

    private classify(t: number, orients: number[], p: XY): Location {
        const zeros = orients.filter(o => o === 0).length
        if (zeros === 0) {
            return { kind: 'triangle', triangle: t }
        }
        if (zeros === 1) {
            return { kind: 'edge', edge: 3 * t + orients.indexOf(0) }
        }
        for (const i of this.triangleVertices(t)) {
            const v = this.vertices[i]
            if (v.x === p.x && v.y === p.y) {
                return { kind: 'vertex', vertex: i }
            }
        }
        return { kind: 'triangle', triangle: t }
    }

    /**
     * Turn a hit into a vertex hit when p is within the coincidence tolerance
     * of one of the vertices around it.
     */
    private snap(loc: Location, p: XY): Location {
        if (loc.kind === 'vertex') {
            return loc
        }
        const candidates: number[] = []
        if (loc.kind === 'triangle') {
            candidates.push(...this.triangleVertices(loc.triangle))
        }
        else {
            candidates.push(...this.triangleVertices(Math.floor(loc.edge / 3)))
            const f = this.twins[loc.edge]
            if (f !== -1) {
                candidates.push(this.apex(f))
            }
        }

        const tolSq = this.vertexTolerance * this.vertexTolerance
        let best = -1
        let bestSq = Number.POSITIVE_INFINITY
        for (const i of candidates) {
            const d = sqDistance(this.vertices[i], p)
            if (d <= tolSq && d < bestSq) {
                best = i
                bestSq = d
            }
        }
        return best === -1 ? loc : { kind: 'vertex', vertex: best }
    }

    private scan(p: XY): Location {
        const v = this.vertices
        for (let t = 0; t < this.triangleCount; t++) {
            const base = 3 * t
            const orients = [
                orient(v[this.origins[base]], v[this.origins[base + 1]], p),
                orient(v[this.origins[base + 1]], v[this.origins[base + 2]], p),
                orient(v[this.origins[base + 2]], v[this.origins[base]], p)
            ]
            if (orients[0] >= 0 && orients[1] >= 0 && orients[2] >= 0) {
                return this.snap(this.classify(t, orients, p), p)
            }
        }
        for (let e = 0; e < this.twins.length; e++) {
            if (this.twins[e] === -1 && orient(v[this.origins[e]], v[this.dest(e)], p) < 0) {
                return this.snap({ kind: 'outside', edge: e }, p)
            }
        }
        throw new Error(`Failed to locate vertex (${p.x}, ${p.y}). The mesh may be corrupted.`)
    }

    // -----------------------------------------------------------------------
    // local rewrites

    private makeTriangle(slot: number, a: number, b: number, c: number, region: number): number {
        if (slot === -1) {
            const t = this.triangleCount
            this.origins.push(a, b, c)
            this.twins.push(-1, -1, -1)
            this.regions.push(region)
            return t
        }
        const base = 3 * slot
        this.origins[base] = a
        this.origins[base + 1] = b
        this.origins[base + 2] = c
        this.regions[slot] = region
        return slot
    }

    private link(e: number, f: number): void {
        this.twins[e] = f
        if (f !== -1) {
            this.twins[f] = e
        }
    }

    private touch(t: number): void {
        for (let k = 0; k < 3; k++) {
            this.vert_to_edge[this.origins[3 * t + k]] = 3 * t + k
        }
        this.lastTriangle = t
    }

    /**
     * First triangle of the mesh. The vertices are reordered counter-clockwise.
     */
    bootstrap(a: number, b: number, c: number): void {
        if (this.isBootstrapped) {
            throw new Error('Mesh is already bootstrapped')
        }
        const v = this.vertices
        const t = orient(v[a], v[b], v[c]) > 0
            ? this.makeTriangle(-1, a, b, c, -1)
            : this.makeTriangle(-1, a, c, b, -1)
        this.touch(t)
    }

    /**
     * Split triangle t into three at the interior vertex p.
     * @returns the half-edges opposite p in the new triangles
     */
    splitTriangle(t: number, p: number): number[] {
        const [a, b, c] = this.triangleVertices(t)
        const base = 3 * t
        const o0 = this.twins[base]
        const o1 = this.twins[base + 1]
        const o2 = this.twins[base + 2]
        const region = this.regions[t]

        this.makeTriangle(t, a, b, p, region)
        const t1 = this.makeTriangle(-1, b, c, p, region)
        const t2 = this.makeTriangle(-1, c, a, p, region)

        this.link(base, o0)
        this.link(3 * t1, o1)
        this.link(3 * t2, o2)
        this.link(base + 1, 3 * t1 + 2)
        this.link(3 * t1 + 1, 3 * t2 + 2)
        this.link(3 * t2 + 1, base + 2)

        this.touch(t1)
        this.touch(t2)
        this.touch(t)
        return [base, 3 * t1, 3 * t2]
    }

    /**
     * Split the edge of half-edge e at the vertex p, which must lie strictly
     * between its endpoints. One triangle becomes two on the hull, two become
     * four inside. Constraint flags carry over to both halves.
     */
    splitEdge(e: number, p: number): { opposite: number[], constraintIds: readonly number[] | undefined } {
        const f = this.twins[e]
        const a = this.origins[e]
        const b = this.dest(e)
        const c = this.apex(e)
        const oBC = this.twins[nextEdge(e)]
        const oCA = this.twins[prevEdge(e)]
        const tA = Math.floor(e / 3)
        const rA = this.regions[tA]

        // (a, p, c) takes over the slot of e's triangle, (p, b, c) is new
        this.makeTriangle(tA, a, p, c, rA)
        const tB = this.makeTriangle(-1, p, b, c, rA)
        this.link(3 * tA + 2, oCA)
        this.link(3 * tB + 1, oBC)
        this.link(3 * tA + 1, 3 * tB + 2)

        const opposite = [3 * tA + 2, 3 * tB + 1]

        if (f === -1) {
            this.link(3 * tA, -1)
            this.link(3 * tB, -1)
        }
        else {
            const d = this.apex(f)
            const oAD = this.twins[nextEdge(f)]
            const oDB = this.twins[prevEdge(f)]
            const tF = Math.floor(f / 3)
            const rF = this.regions[tF]

            this.makeTriangle(tF, b, p, d, rF)
            const tG = this.makeTriangle(-1, p, a, d, rF)
            this.link(3 * tF + 2, oDB)
            this.link(3 * tG + 1, oAD)
            this.link(3 * tF + 1, 3 * tG + 2)
            this.link(3 * tA, 3 * tG)
            this.link(3 * tB, 3 * tF)

            opposite.push(3 * tF + 2, 3 * tG + 1)
            this.touch(tF)
            this.touch(tG)
        }

        this.touch(tB)
        this.touch(tA)

        const key = edgeKey(a, b)
        const constraintIds = this.con_edge.get(key)
        if (constraintIds !== undefined) {
            this.con_edge.delete(key)
            this.con_edge.set(edgeKey(a, p), [...constraintIds])
            this.con_edge.set(edgeKey(p, b), [...constraintIds])
        }

        return { opposite, constraintIds }
    }

    /**
     * Replace the edge of half-edge e by the other diagonal of its quad.
     * Refused (returns false, nothing changes) for hull edges, constrained
     * edges and quads that are not strictly convex.
     *
     * With e = a -> b in (a, b, c) and its twin in (b, a, d), afterwards e is
     * c -> a in (c, a, d) and the twin is d -> b in (d, b, c).
     */
    flip(e: number): boolean {
        const f = this.twins[e]
        if (f === -1) {
            return false
        }
        const a = this.origins[e]
        const b = this.dest(e)
        const c = this.apex(e)
        const d = this.apex(f)
        if (this.isConstrained(a, b)) {
            return false
        }
        const v = this.vertices
        if (!isQuadConvex(v[a], v[d], v[b], v[c])) {
            return false
        }

        const oBC = this.twins[nextEdge(e)]
        const oCA = this.twins[prevEdge(e)]
        const oAD = this.twins[nextEdge(f)]
        const oDB = this.twins[prevEdge(f)]

        this.origins[e] = c
        this.origins[nextEdge(e)] = a
        this.origins[prevEdge(e)] = d
        this.origins[f] = d
        this.origins[nextEdge(f)] = b
        this.origins[prevEdge(f)] = c

        this.link(e, oCA)
        this.link(nextEdge(e), oAD)
        this.link(f, oDB)
        this.link(nextEdge(f), oBC)
        this.link(prevEdge(e), prevEdge(f))

        this.touch(Math.floor(f / 3))
        this.touch(Math.floor(e / 3))
        return true
    }

    /**
     * Fan new triangles from the outside vertex p to every hull edge that
     * strictly sees it, starting from the visible hull half-edge h.
     * @returns the half-edges opposite p in the new triangles
     */
    extendHull(h: number, p: number): number[] {
        const v = this.vertices
        const visible = (e: number) => orient(v[this.origins[e]], v[this.dest(e)], v[p]) < 0
        const guard = this.twins.length

        let first = h
        for (let i = 0; i < guard && visible(this.prevHull(first)); i++) {
            first = this.prevHull(first)
        }
        const chain = [first]
        for (let e = this.nextHull(first); e !== first && visible(e) && chain.length < guard; e = this.nextHull(e)) {
            chain.push(e)
        }

        const opposite: number[] = []
        let previous = -1
        for (const e of chain) {
            const a = this.origins[e]
            const b = this.dest(e)
            const t = this.makeTriangle(-1, b, a, p, -1)
            this.link(3 * t, e)
            if (previous !== -1) {
                this.link(3 * previous + 2, 3 * t + 1)
            }
            this.touch(t)
            opposite.push(3 * t)
            previous = t
        }
        return opposite
    }

    // -----------------------------------------------------------------------
    // region tags

    setRegion(t: number, region: number): void {
        this.regions[t] = region
    }

    clearRegions(): void {
        this.regions.fill(-1)
    }
}
