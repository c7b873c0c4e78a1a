// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { Vertex, inCircleDet, orient, sqDistance } from './geom'
import { Topology, nextEdge } from './topology'

export type InsertResult =
    | { kind: 'duplicate', vertex: Vertex }
    | { kind: 'pending' }
    | { kind: 'inserted', vertex: number }

/**
 * Told about every constrained edge a -> b that an insertion split at p.
 */
export interface SplitListener {
    constrainedEdgeSplit(a: number, b: number, p: number, constraintIds: readonly number[]): void
}

export class Inserter {
    // every queued vertex, replayed after bootstrap so that duplicates get aliased
    private pending: Vertex[] = []
    private distinct: Vertex[] = []

    constructor(private readonly topo: Topology, private readonly listener: SplitListener) {
    }

    /** Vertices waiting for a bootstrap triangle, duplicates not counted */
    get pendingCount(): number {
        return this.distinct.length
    }

    /** Vertices waiting for a bootstrap triangle, without merged duplicates */
    get pendingVertices(): readonly Vertex[] {
        return this.distinct
    }

    insert(v: Vertex): InsertResult {
        if (!Number.isFinite(v.x) || !Number.isFinite(v.y)) {
            throw new Error(`Vertex ${v.toStr()} has non-finite coordinates`)
        }

        const topo = this.topo
        const known = topo.indexOf(v)
        if (known !== undefined) {
            return { kind: 'duplicate', vertex: topo.vertices[known] }
        }

        if (!topo.isBootstrapped) {
            return this.addPending(v)
        }

        const loc = topo.locate(v)
        switch (loc.kind) {
            case 'vertex': {
                topo.alias(v, loc.vertex)
                return { kind: 'duplicate', vertex: topo.vertices[loc.vertex] }
            }
            case 'triangle': {
                const p = topo.addVertex(v)
                this.restoreDelaunay(topo.splitTriangle(loc.triangle, p))
                return { kind: 'inserted', vertex: p }
            }
            case 'edge': {
                return { kind: 'inserted', vertex: this.splitEdgeAt(loc.edge, v) }
            }
            case 'outside': {
                const p = topo.addVertex(v)
                this.restoreDelaunay(topo.extendHull(loc.edge, p))
                return { kind: 'inserted', vertex: p }
            }
        }
    }

    /**
     * Insert v on the edge of half-edge e. Also used directly by the
     * conformity pass, whose midpoints are not located first.
     */
    splitEdgeAt(e: number, v: Vertex): number {
        const topo = this.topo
        const a = topo.origins[e]
        const b = topo.dest(e)
        const p = topo.addVertex(v)
        const { opposite, constraintIds } = topo.splitEdge(e, p)
        if (constraintIds !== undefined) {
            this.listener.constrainedEdgeSplit(a, b, p, constraintIds)
        }
        this.restoreDelaunay(opposite)
        return p
    }

    /**
     * Flip cascade. Each entry is a half-edge facing the new vertex in its
     * triangle; when the vertex beyond it lies inside that triangle's
     * circumcircle the edge is flipped and the two edges now facing the new
     * vertex are examined in turn. Constrained edges stay. Cocircular quads
     * keep their diagonal.
     */
    restoreDelaunay(stack: number[]): number {
        const topo = this.topo
        const v = topo.vertices
        let swaps = 0

        while (stack.length > 0) {
            const e = stack.pop()
            if (e === undefined) {
                break
            }
            const f = topo.twins[e]
            if (f === -1) {
                continue
            }
            const a = topo.origins[e]
            const b = topo.dest(e)
            if (topo.isConstrained(a, b)) {
                continue
            }
            if (inCircleDet(v[a], v[b], v[topo.apex(e)], v[topo.apex(f)]) <= 0) {
                continue
            }
            if (!topo.flip(e)) {
                continue
            }
            swaps++
            stack.push(f, nextEdge(e))
        }

        return swaps
    }

    // -----------------------------------------------------------------------

    private addPending(v: Vertex): InsertResult {
        if (this.pending.includes(v)) {
            return { kind: 'duplicate', vertex: v }
        }
        const tolSq = this.topo.vertexTolerance * this.topo.vertexTolerance
        const twin = this.distinct.find(w => sqDistance(w, v) <= tolSq)
        this.pending.push(v)
        if (twin !== undefined) {
            return { kind: 'duplicate', vertex: twin }
        }
        this.distinct.push(v)
        if (!this.bootstrap()) {
            return { kind: 'pending' }
        }
        const i = this.topo.indexOf(v)
        return i === undefined ? { kind: 'pending' } : { kind: 'inserted', vertex: i }
    }

    /**
     * The first two distinct queued vertices and the first one off their line
     * make the bootstrap triangle; the rest of the queue is then replayed in
     * arrival order.
     */
    private bootstrap(): boolean {
        const list = this.pending
        const tolSq = this.topo.vertexTolerance * this.topo.vertexTolerance
        const a = list[0]
        const b = list.find(w => sqDistance(w, a) > tolSq)
        if (b === undefined) {
            return false
        }
        const c = list.find(w => orient(a, b, w) !== 0 && sqDistance(w, a) > tolSq && sqDistance(w, b) > tolSq)
        if (c === undefined) {
            return false
        }

        const topo = this.topo
        topo.bootstrap(topo.addVertex(a), topo.addVertex(b), topo.addVertex(c))

        this.pending = []
        this.distinct = []
        for (const w of list) {
            if (w !== a && w !== b && w !== c) {
                this.insert(w)
            }
        }
        return true
    }
}
