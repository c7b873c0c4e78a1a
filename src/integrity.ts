// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { PolygonConstraint } from './constraints'
import { Vertex, inCircleDet, orient, sqDistance } from './geom'
import { TopologyView, edgeKey, nextEdge, prevEdge } from './topology'

/**
 * Constraint bookkeeping as seen by the integrity check.
 */
export interface ConstraintView {
    readonly constraints: readonly PolygonConstraint[]
    getChains(constraintIndex: number): readonly (readonly number[])[]
}

/**
 * Checks the global invariants of a mesh. Inconsistencies are collected as
 * messages, never thrown.
 */
export class IntegrityCheck {
    private violations_: string[] = []

    constructor(private readonly topo: TopologyView, private readonly constraints: ConstraintView, private readonly tolerance = 0) {
    }

    /**
     * @returns true when no violation was found
     */
    inspect(): boolean {
        this.violations_ = []
        if (this.checkAdjacency()) {
            this.checkTriangles()
            this.checkConstraints()
            this.checkDelaunay()
        }
        return this.violations_.length === 0
    }

    getViolations(): readonly string[] {
        return this.violations_
    }

    getMessage(): string {
        return this.violations_.length === 0
            ? 'No violations found'
            : `${this.violations_.length} violation(s): ${this.violations_.join('; ')}`
    }

    private fail(msg: string): void {
        this.violations_.push(msg)
    }

    // every half-edge has a valid origin and a twin linking back with the
    // same endpoints; no undirected edge is bounded by more than two triangles
    private checkAdjacency(): boolean {
        const { origins, twins, vertices } = this.topo
        const n = origins.length
        const before = this.violations_.length

        if (n % 3 !== 0 || twins.length !== n) {
            this.fail(`half-edge arrays are inconsistent (${n} origins, ${twins.length} twins)`)
            return false
        }

        for (let e = 0; e < n; e++) {
            const v = origins[e]
            if (!Number.isInteger(v) || v < 0 || v >= vertices.length) {
                this.fail(`half-edge ${e} has invalid origin ${v}`)
            }
        }
        if (this.violations_.length > before) {
            return false
        }

        const sides = new Map<string, number[]>()
        for (let e = 0; e < n; e++) {
            const a = origins[e]
            const b = origins[nextEdge(e)]
            const key = edgeKey(a, b)
            const list = sides.get(key)
            if (list === undefined) {
                sides.set(key, [e])
            }
            else {
                list.push(e)
            }

            const f = twins[e]
            if (f === -1) {
                continue
            }
            if (!Number.isInteger(f) || f < 0 || f >= n) {
                this.fail(`half-edge ${e} has invalid twin ${f}`)
                continue
            }
            if (twins[f] !== e) {
                this.fail(`invalid twin link: ${e} -> ${f} but ${f} -> ${twins[f]}`)
            }
            if (origins[f] !== b || origins[nextEdge(f)] !== a) {
                this.fail(`half-edges ${e}/${f} do not share end-points (${a}, ${b}) / (${origins[f]}, ${origins[nextEdge(f)]})`)
            }
        }

        sides.forEach((list, key) => {
            if (list.length > 2) {
                this.fail(`edge ${key} is bounded by ${list.length} triangles`)
            }
            else if (list.length === 2 && twins[list[0]] !== list[1]) {
                this.fail(`edge ${key} is bounded by two triangles that are not linked`)
            }
        })
        return this.violations_.length === before
    }

    // triangles are counter-clockwise and together cover exactly the hull,
    // which is convex
    private checkTriangles(): void {
        const { origins, twins, vertices } = this.topo
        const nTri = origins.length / 3
        const areas: number[] = []
        const used = new Set<number>()

        for (let t = 0; t < nTri; t++) {
            const [a, b, c] = [origins[3 * t], origins[3 * t + 1], origins[3 * t + 2]]
            used.add(a).add(b).add(c)
            const o = orient(vertices[a], vertices[b], vertices[c])
            if (o <= 0) {
                this.fail(`triangle ${t} (${a}, ${b}, ${c}) is ${o === 0 ? 'degenerate' : 'clockwise'}`)
            }
            areas.push(o / 2)
        }

        if (nTri > 0) {
            vertices.forEach((_, i) => {
                if (!used.has(i)) {
                    this.fail(`vertex ${i} belongs to no triangle`)
                }
            })
        }

        const hullAreas: number[] = []
        for (let e = 0; e < origins.length; e++) {
            if (twins[e] !== -1) {
                continue
            }
            const p = vertices[origins[e]]
            const q = vertices[origins[nextEdge(e)]]
            hullAreas.push((p.x * q.y - q.x * p.y) / 2)

            // the hull turns left (or goes straight) at the end of e
            const succ = this.nextHull(e)
            if (succ !== -1 && orient(p, q, vertices[origins[nextEdge(succ)]]) < 0) {
                this.fail(`hull is not convex at vertex ${origins[nextEdge(e)]}`)
            }
        }

        const trianglesArea = sum(areas)
        const hullArea = sum(hullAreas)
        if (Math.abs(trianglesArea - hullArea) > 1e-9 * Math.max(1, Math.abs(hullArea))) {
            this.fail(`triangles cover an area of ${trianglesArea} but the hull encloses ${hullArea}, triangles overlap`)
        }
    }

    // every constrained edge exists and every realized chain matches its
    // segment and the edge flags
    private checkConstraints(): void {
        const topo = this.topo
        const { origins, vertices } = topo
        const present = new Set<string>()
        for (let e = 0; e < origins.length; e++) {
            present.add(edgeKey(origins[e], origins[nextEdge(e)]))
        }

        const flagged = new Map<string, readonly number[]>()
        for (const [a, b, ids] of topo.constrainedEdges()) {
            flagged.set(edgeKey(a, b), ids)
            if (!present.has(edgeKey(a, b))) {
                this.fail(`constrained edge ${a}-${b} is not in the mesh`)
            }
        }

        const realized = new Set<string>()
        this.constraints.constraints.forEach((c, k) => {
            const segments = c.getSegments()
            const chains = this.constraints.getChains(k)
            if (chains.length !== segments.length) {
                this.fail(`constraint ${k} has ${segments.length} segments but ${chains.length} chains`)
                return
            }
            segments.forEach(([u, v], s) => {
                const chain = chains[s]
                if (chain.length === 0) {
                    this.fail(`segment ${s} of constraint ${k} has an empty chain`)
                    return
                }
                const first = vertices[chain[0]]
                const last = vertices[chain[chain.length - 1]]
                if (!this.coincide(first, u) || !this.coincide(last, v)) {
                    this.fail(`chain of segment ${s} of constraint ${k} does not start and end at the segment endpoints`)
                }
                // midpoints of conformity splits are rounded, every other
                // chain vertex lies exactly on the line of the chain's ends
                const exact = chain.every(i => !vertices[i].synthetic)
                const lenSq = sqDistance(first, last)
                for (let i = 1; i < chain.length - 1; i++) {
                    const w = vertices[chain[i]]
                    const t = ((w.x - first.x) * (last.x - first.x) + (w.y - first.y) * (last.y - first.y)) / lenSq
                    const o = orient(first, last, w)
                    const off = exact ? Math.abs(o) : Math.abs(o) / Math.sqrt(lenSq)
                    if (off > (exact ? 0 : this.tolerance) || t <= 0 || t >= 1) {
                        this.fail(`vertex ${chain[i]} in the chain of segment ${s} of constraint ${k} is not on the segment`)
                    }
                }
                for (let i = 0; i + 1 < chain.length; i++) {
                    const key = edgeKey(chain[i], chain[i + 1])
                    realized.add(`${key}#${k}`)
                    if (!flagged.get(key)?.includes(k)) {
                        this.fail(`edge ${key} of constraint ${k} is not flagged as constrained`)
                    }
                }
            })
        })

        flagged.forEach((ids, key) => {
            ids.forEach(k => {
                if (!realized.has(`${key}#${k}`)) {
                    this.fail(`edge ${key} is flagged for constraint ${k} but realizes none of its segments`)
                }
            })
        })
    }

    // unconstrained interior edges pass the in-circle test
    private checkDelaunay(): void {
        const { origins, twins, vertices } = this.topo
        for (let e = 0; e < origins.length; e++) {
            const f = twins[e]
            if (f < e) {
                continue
            }
            const a = origins[e]
            const b = origins[nextEdge(e)]
            if (this.topo.isConstrained(a, b)) {
                continue
            }
            const c = origins[prevEdge(e)]
            const d = origins[prevEdge(f)]
            if (inCircleDet(vertices[a], vertices[b], vertices[c], vertices[d]) > 0) {
                this.fail(`triangles shared by edge ${a}-${b} are not Delaunay`)
            }
        }
    }

    private nextHull(h: number): number {
        const twins = this.topo.twins
        let e = nextEdge(h)
        for (let guard = 0; guard < twins.length; guard++) {
            if (twins[e] === -1) {
                return e
            }
            e = nextEdge(twins[e])
        }
        return -1
    }

    private coincide(p: Vertex, q: Vertex): boolean {
        return Math.abs(p.x - q.x) <= this.tolerance && Math.abs(p.y - q.y) <= this.tolerance
    }
}

// Kahan and Babuska summation, Neumaier variant
function sum(x: number[]): number {
    if (x.length === 0) {
        return 0
    }
    let total = x[0]
    let err = 0
    for (let i = 1; i < x.length; i++) {
        const k = x[i]
        const m = total + k
        err += Math.abs(total) >= Math.abs(k) ? total - m + k : k - m + total
        total = m
    }
    return total + err
}
