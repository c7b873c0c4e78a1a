// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import {
    GeomEdge, Vertex, XY, inCircleDet, isOnSegment, orient, segmentsCross, segmentsIntersect, signedArea, sqDistance
} from './geom'
import { Inserter, SplitListener } from './inserter'
import { Logger } from './log'
import { Topology, nextEdge, prevEdge } from './topology'

/**
 * A closed loop of vertices whose segments must appear as mesh edges.
 * Counter-clockwise loops enclose a region, clockwise loops enclose a hole.
 */
export class PolygonConstraint {
    private vertices_: Vertex[] = []
    private complete_ = false
    private area_ = 0
    private index_ = -1

    constructor(vertices: readonly Vertex[] = []) {
        vertices.forEach(v => this.add(v))
    }

    get vertices(): readonly Vertex[] {
        return this.vertices_
    }

    get isComplete(): boolean {
        return this.complete_
    }

    /** Signed area, available once completed */
    get area(): number {
        return this.area_
    }

    get isHole(): boolean {
        return this.area_ < 0
    }

    /** Position in the owning mesh's constraint list, -1 until registered */
    get constraintIndex(): number {
        return this.index_
    }

    add(v: Vertex): void {
        if (this.complete_) {
            throw new Error('Cannot add a vertex to a completed polygon constraint')
        }
        this.vertices_.push(v)
    }

    /**
     * Fix the loop. A closing vertex repeating the first one is dropped, as
     * are consecutive vertices at the same coordinates.
     */
    complete(): void {
        if (this.complete_) {
            return
        }
        const list: Vertex[] = []
        for (const v of this.vertices_) {
            const last = list[list.length - 1]
            if (last === undefined || last.x !== v.x || last.y !== v.y) {
                list.push(v)
            }
        }
        while (list.length > 1 && list[0].x === list[list.length - 1].x && list[0].y === list[list.length - 1].y) {
            list.pop()
        }
        this.vertices_ = list
        this.area_ = signedArea(list)
        this.complete_ = true
    }

    getSegments(): [Vertex, Vertex][] {
        const n = this.vertices_.length
        return this.vertices_.map((v, i) => [v, this.vertices_[(i + 1) % n]])
    }

    /** @internal */
    register(index: number): void {
        this.index_ = index
    }
}

/**
 * Keeps polygon constraints realized in the mesh: inserts their vertices,
 * recovers their segments, follows segment splits and derives the region
 * tags of the triangles.
 */
export class ConstraintManager implements SplitListener {
    private list: PolygonConstraint[] = []
    // constraint index -> segment -> chain of vertex indices realizing it
    private chains: number[][][] = []
    // set while a conformity pass runs, which retags once at its end
    private conforming = false

    constructor(private readonly topo: Topology, private readonly log: Logger, private readonly maxConformitySplits = 10000) {
    }

    get constraints(): readonly PolygonConstraint[] {
        return this.list
    }

    getChains(constraintIndex: number): readonly (readonly number[])[] {
        return this.chains[constraintIndex] ?? []
    }

    addConstraints(constraints: readonly PolygonConstraint[], enforceOnly: boolean, inserter: Inserter): void {
        if (constraints.length === 0) {
            return
        }
        this.validate(constraints, inserter.pendingVertices)

        const t0 = performance.now()

        constraints.forEach(c => c.vertices.forEach(v => inserter.insert(v)))

        constraints.forEach(c => {
            const index = this.list.length
            const chains = c.getSegments().map(([u, v]) => this.realize(this.resolve(u), this.resolve(v), index))
            c.register(index)
            this.list.push(c)
            this.chains.push(chains)
        })

        if (!enforceOnly) {
            this.conforming = true
            let splits = 0
            try {
                splits = this.restoreConformity(inserter)
            }
            finally {
                this.conforming = false
            }
            if (splits > 0) {
                this.log(`Inserted ${splits} synthetic vertices to restore conformity.`)
            }
        }

        this.retag()
        this.log(`Added ${constraints.length} constraints in ${(performance.now() - t0).toFixed(2)} ms.`)
    }

    constrainedEdgeSplit(a: number, b: number, p: number, constraintIds: readonly number[]): void {
        for (const id of constraintIds) {
            for (const chain of this.chains[id] ?? []) {
                for (let i = 0; i + 1 < chain.length; i++) {
                    if ((chain[i] === a && chain[i + 1] === b) || (chain[i] === b && chain[i + 1] === a)) {
                        chain.splice(i + 1, 0, p)
                        break
                    }
                }
            }
        }
        this.log(`Split constrained edge ${a}-${b} at vertex ${p}.`)
        if (!this.conforming) {
            this.retag()
        }
    }

    /**
     * Flood fill the region tags from the interior side of every realized
     * edge, stopping at constrained edges. Constraints are filled in
     * registration order.
     */
    retag(): void {
        const topo = this.topo
        topo.clearRegions()

        this.list.forEach(c => {
            const k = c.constraintIndex
            const queue: number[] = []
            for (const chain of this.chains[k]) {
                for (let i = 0; i + 1 < chain.length; i++) {
                    // the interior lies left of the directed edge for a region, right for a hole
                    const e = c.isHole
                        ? topo.directedEdge(chain[i + 1], chain[i])
                        : topo.directedEdge(chain[i], chain[i + 1])
                    if (e !== -1) {
                        queue.push(Math.floor(e / 3))
                    }
                }
            }

            while (queue.length > 0) {
                const t = queue.pop()
                if (t === undefined || topo.regions[t] === k) {
                    continue
                }
                topo.setRegion(t, k)
                for (let j = 0; j < 3; j++) {
                    const e = 3 * t + j
                    const f = topo.twins[e]
                    if (f !== -1 && !topo.isConstrained(topo.origins[e], topo.dest(e))) {
                        queue.push(Math.floor(f / 3))
                    }
                }
            }
        })
    }

    // -----------------------------------------------------------------------

    private resolve(v: Vertex): number {
        const i = this.topo.indexOf(v)
        if (i === undefined) {
            throw new Error(`Constraint vertex ${v.toStr()} is not part of the mesh`)
        }
        return i
    }

    /**
     * The loop a polygon becomes once its vertices are merged the way
     * insertion merges them: into a mesh vertex, a queued vertex or an
     * earlier vertex of the batch within the vertex tolerance. Vertices that
     * do not merge are appended to `fresh`.
     */
    private collapse(c: PolygonConstraint, pending: readonly Vertex[], fresh: Vertex[]): XY[] {
        const topo = this.topo
        const tolSq = topo.vertexTolerance * topo.vertexTolerance
        const near = (v: Vertex) => (w: Vertex) => sqDistance(w, v) <= tolSq

        const loop: XY[] = []
        for (const v of c.vertices) {
            let w: XY | undefined
            const known = topo.indexOf(v)
            if (known !== undefined) {
                w = topo.vertices[known]
            }
            else if (topo.isBootstrapped) {
                const loc = topo.locate(v, false)
                if (loc.kind === 'vertex') {
                    w = topo.vertices[loc.vertex]
                }
            }
            w = w ?? pending.find(near(v)) ?? fresh.find(near(v))
            if (w === undefined) {
                fresh.push(v)
                w = v
            }
            if (loop[loop.length - 1] !== w) {
                loop.push(w)
            }
        }
        while (loop.length > 1 && loop[0] === loop[loop.length - 1]) {
            loop.pop()
        }
        return loop
    }

    /**
     * Input checks for a whole batch, run on the loops as they will be
     * realized in the mesh. Nothing is mutated before they pass.
     */
    private validate(constraints: readonly PolygonConstraint[], pending: readonly Vertex[]): void {
        const verts = this.topo.vertices
        const registered: GeomEdge[] = []
        this.list.forEach(c => {
            const loop = c.vertices.map(v => verts[this.resolve(v)])
            registered.push(...loop.map((v, s): GeomEdge => [v, loop[(s + 1) % loop.length]]))
        })
        const fresh: Vertex[] = []

        constraints.forEach((c, i) => {
            if (!c.isComplete) {
                throw new Error(`Polygon constraint ${i} is not completed`)
            }
            if (c.constraintIndex !== -1 || constraints.indexOf(c) !== i) {
                throw new Error(`Polygon constraint ${i} is already registered`)
            }
            const loop = this.collapse(c, pending, fresh)
            if (loop.length < 3) {
                throw new Error(`Polygon constraint ${i} has ${loop.length} distinct vertices, at least 3 are needed`)
            }
            const area = signedArea(loop)
            if (area === 0 || (area < 0) !== c.isHole) {
                throw new Error(`Polygon constraint ${i} is degenerate (zero area)`)
            }

            const segs = loop.map((v, s): GeomEdge => [v, loop[(s + 1) % loop.length]])
            const n = segs.length
            for (let s = 0; s < n; s++) {
                // consecutive segments may only share their common vertex
                const [a, b] = segs[s]
                const c2 = segs[(s + 1) % n][1]
                if (orient(a, b, c2) === 0 && (a.x - b.x) * (c2.x - b.x) + (a.y - b.y) * (c2.y - b.y) > 0) {
                    throw new Error(`Polygon constraint ${i} folds back on itself at vertex ${(s + 1) % n}`)
                }
                for (let t = s + 2; t < n; t++) {
                    if (s === 0 && t === n - 1) {
                        continue
                    }
                    if (segmentsIntersect(segs[s], segs[t])) {
                        throw new Error(`Polygon constraint ${i} is self-intersecting (segments ${s} and ${t})`)
                    }
                }
                for (const other of registered) {
                    if (segmentsCross(segs[s], other)) {
                        throw new Error(`Segment ${s} of polygon constraint ${i} crosses an existing constraint`)
                    }
                }
            }
            registered.push(...segs)
        })
    }

    /**
     * Realize the segment u-v, possibly through vertices lying exactly on it.
     * @returns the chain of vertex indices from u to v
     */
    private realize(u: number, v: number, constraintIndex: number): number[] {
        const chain = [u]
        let cur = u
        while (cur !== v) {
            if (chain.length > this.topo.vertices.length) {
                throw new Error(`Could not realize segment ${u}-${v}`)
            }
            cur = this.recover(cur, v, constraintIndex)
            chain.push(cur)
        }
        return chain
    }

    /**
     * Make an edge from `from` towards `to`, ending at `to` or at the first
     * vertex lying on the segment, and mark it constrained.
     * @returns the vertex the new edge ends at
     */
    private recover(from: number, to: number, constraintIndex: number): number {
        const topo = this.topo
        const verts = topo.vertices

        if (topo.findEdge(from, to) !== -1) {
            topo.markConstrained(from, to, constraintIndex)
            return to
        }

        for (const w of topo.neighbors(from)) {
            if (isOnSegment(verts[from], verts[to], verts[w])) {
                topo.markConstrained(from, w, constraintIndex)
                return w
            }
        }

        const { crossings, target } = this.getEdgeIntersections(from, to)
        const touched = this.fixEdgeIntersections(from, target, crossings)
        topo.markConstrained(from, target, constraintIndex)
        this.restoreDelaunay(touched)
        return target
    }

    /**
     * Walk along from -> to collecting the edges it crosses, up to `to` or
     * the first vertex found exactly on the segment.
     */
    private getEdgeIntersections(from: number, to: number): { crossings: [number, number][], target: number } {
        const topo = this.topo
        const verts = topo.vertices
        const p0 = verts[from]
        const p1 = verts[to]

        // the triangle at `from` the segment leaves through: x right of it, y left
        let h = -1
        for (const e of topo.outgoing(from)) {
            if (orient(p0, p1, verts[topo.dest(e)]) < 0 && orient(p0, p1, verts[topo.apex(e)]) > 0) {
                h = nextEdge(e)
                break
            }
        }
        if (h === -1) {
            throw new Error(`Segment ${from}-${to} does not leave vertex ${from} through the mesh`)
        }

        const crossings: [number, number][] = []
        for (let guard = 0; guard < topo.origins.length; guard++) {
            const a = topo.origins[h]
            const b = topo.dest(h)
            if (topo.isConstrained(a, b)) {
                throw new Error(`Segment ${from}-${to} crosses the constrained edge ${a}-${b}`)
            }
            crossings.push([a, b])

            const t = topo.twins[h]
            if (t === -1) {
                throw new Error(`Segment ${from}-${to} exited the hull`)
            }
            const z = topo.apex(t)
            if (z === to) {
                return { crossings, target: to }
            }
            const oz = orient(p0, p1, verts[z])
            if (oz === 0) {
                return { crossings, target: z }
            }
            h = oz > 0 ? nextEdge(t) : prevEdge(t)
        }
        throw new Error(`Could not trace segment ${from}-${to} through the mesh`)
    }

    /**
     * Flip the crossing edges away (Sloan). An edge whose quad is not convex
     * goes back in the queue, as does a new diagonal that still crosses.
     * @returns the sides and diagonals of every flipped quad
     */
    private fixEdgeIntersections(from: number, to: number, crossings: [number, number][]): [number, number][] {
        const topo = this.topo
        const verts = topo.vertices
        const segment: GeomEdge = [verts[from], verts[to]]
        const touched: [number, number][] = []
        const maxIter = Math.max(1000, 10 * crossings.length * crossings.length)

        for (let iter = 0; crossings.length > 0; iter++) {
            if (iter > maxIter) {
                throw new Error(`Could not add segment ${from}-${to} to the mesh after ${maxIter} iterations`)
            }
            const item = crossings.shift()
            if (item === undefined) {
                break
            }
            const [a, b] = item
            const e = topo.findEdge(a, b)
            if (e === -1 || topo.twins[e] === -1) {
                throw new Error(`Crossing edge ${a}-${b} vanished while adding segment ${from}-${to}`)
            }
            const c = topo.apex(e)
            const d = topo.apex(topo.twins[e])

            if (!topo.flip(e)) {
                crossings.push(item)
                continue
            }

            touched.push([a, c], [c, b], [b, d], [d, a])
            if (c !== from && c !== to && d !== from && d !== to && segmentsCross(segment, [verts[c], verts[d]])) {
                crossings.push([c, d])
            }
            else {
                touched.push([c, d])
            }
        }
        return touched
    }

    /**
     * Lawson flips over the edges touched by a recovery, re-queuing the sides
     * of every flipped quad.
     */
    private restoreDelaunay(edges: [number, number][]): void {
        const topo = this.topo
        const verts = topo.vertices

        while (edges.length > 0) {
            const item = edges.pop()
            if (item === undefined) {
                break
            }
            const [a, b] = item
            if (topo.isConstrained(a, b)) {
                continue
            }
            const e = topo.findEdge(a, b)
            if (e === -1 || topo.twins[e] === -1) {
                continue
            }
            const c = topo.apex(e)
            const d = topo.apex(topo.twins[e])
            if (inCircleDet(verts[a], verts[b], verts[c], verts[d]) > 0 && topo.flip(e)) {
                edges.push([a, c], [c, b], [b, d], [d, a])
            }
        }
    }

    /**
     * Split constrained edges that fail the in-circle test against their
     * neighbors at their midpoints, until none does or the budget runs out.
     */
    private restoreConformity(inserter: Inserter): number {
        const topo = this.topo
        const verts = topo.vertices
        const minSq = Math.pow(4 * topo.vertexTolerance, 2)
        let splits = 0
        let changed = true

        while (changed && splits < this.maxConformitySplits) {
            changed = false
            for (const [a, b] of topo.constrainedEdges()) {
                if (splits >= this.maxConformitySplits) {
                    break
                }
                const e = topo.findEdge(a, b)
                if (e === -1 || topo.twins[e] === -1) {
                    continue
                }
                const va = verts[a]
                const vb = verts[b]
                if (inCircleDet(va, vb, verts[topo.apex(e)], verts[topo.apex(topo.twins[e])]) <= 0) {
                    continue
                }
                if (sqDistance(va, vb) < minSq) {
                    continue
                }
                inserter.splitEdgeAt(e, new Vertex((va.x + vb.x) / 2, (va.y + vb.y) / 2, (va.z + vb.z) / 2, true))
                splits++
                changed = true
            }
        }

        if (changed) {
            this.log(`Conformity restoration stopped after ${splits} splits.`)
        }
        return splits
    }
}
