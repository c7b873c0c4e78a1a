// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { ConstraintManager, PolygonConstraint } from './constraints'
import { Point, Vertex } from './geom'
import { Inserter } from './inserter'
import { IntegrityCheck } from './integrity'
import { Logger, printToLog, quiet } from './log'
import { Topology, TopologyView } from './topology'

export interface MeshOptions {
    /** Log timings and constraint events through printToLog */
    verbose?: boolean
    /** Upper bound on synthetic vertices inserted by one conformity pass */
    maxConformitySplits?: number
}

export interface MeshTriangle {
    readonly index: number
    /** Counter-clockwise */
    readonly vertices: [Vertex, Vertex, Vertex]
    /** The constraint whose interior holds the triangle */
    readonly region: PolygonConstraint | undefined
}

export type Bounds = { min: Point, max: Point }

/**
 * Incremental constrained Delaunay triangulation of a growing point set.
 * All mutation is synchronous and single-writer.
 */
export class Mesh {
    readonly nominalPointSpacing: number
    private readonly topo: Topology
    private readonly manager: ConstraintManager
    private readonly inserter: Inserter
    private readonly log: Logger

    /**
     * @param nominalPointSpacing typical distance between points; vertices
     * closer than a hundred-thousandth of it are merged
     */
    constructor(nominalPointSpacing = 1, options: MeshOptions = {}) {
        if (!Number.isFinite(nominalPointSpacing) || nominalPointSpacing <= 0) {
            throw new Error(`nominalPointSpacing must be a positive number, got ${nominalPointSpacing}`)
        }
        this.nominalPointSpacing = nominalPointSpacing
        this.log = options.verbose ? printToLog : quiet
        this.topo = new Topology(nominalPointSpacing)
        this.manager = new ConstraintManager(this.topo, this.log, options.maxConformitySplits)
        this.inserter = new Inserter(this.topo, this.manager)
    }

    /** Read access for the collector and the integrity check */
    get topology(): TopologyView {
        return this.topo
    }

    insert(v: Vertex): void {
        this.inserter.insert(v)
    }

    insertAll(vertices: readonly Vertex[]): void {
        const t0 = performance.now()
        vertices.forEach(v => this.inserter.insert(v))
        this.log(`Inserted ${vertices.length} vertices in ${(performance.now() - t0).toFixed(2)} ms.`)
    }

    /**
     * Register completed polygon constraints. The batch is validated first and
     * rejected as a whole on bad input.
     * @param enforceOnly when false, constrained edges that are not Delaunay
     * are split with synthetic vertices until they are
     */
    addConstraints(constraints: readonly PolygonConstraint[], enforceOnly = true): void {
        this.manager.addConstraints(constraints, enforceOnly, this.inserter)
    }

    isBootstrapped(): boolean {
        return this.topo.isBootstrapped
    }

    getIntegrityCheck(): IntegrityCheck {
        return new IntegrityCheck(this.topo, this.manager, this.topo.vertexTolerance)
    }

    getConstraints(): readonly PolygonConstraint[] {
        return this.manager.constraints
    }

    /**
     * The vertex chains currently realizing each segment of a registered
     * constraint, endpoints included.
     */
    getSegmentChains(constraint: PolygonConstraint): Vertex[][] {
        const verts = this.topo.vertices
        return this.manager.getChains(constraint.constraintIndex).map(chain => chain.map(i => verts[i]))
    }

    /** Mesh vertices, or the queued ones before bootstrap */
    getVertices(): readonly Vertex[] {
        return this.topo.isBootstrapped ? this.topo.vertices : this.inserter.pendingVertices
    }

    getVertexCount(): number {
        return this.topo.isBootstrapped ? this.topo.vertices.length : this.inserter.pendingCount
    }

    getTriangleCount(): number {
        return this.topo.triangleCount
    }

    getTriangle(t: number): MeshTriangle {
        const verts = this.topo.vertices
        const [a, b, c] = this.topo.triangleVertices(t)
        const region = this.topo.regions[t]
        return {
            index: t,
            vertices: [verts[a], verts[b], verts[c]],
            region: region === -1 ? undefined : this.manager.constraints[region]
        }
    }

    /** Hull vertices, counter-clockwise */
    getPerimeter(): Vertex[] {
        return this.topo.perimeter().map(i => this.topo.vertices[i])
    }

    getBounds(): Bounds | undefined {
        const list = this.getVertices()
        if (list.length === 0) {
            return undefined
        }
        const min = { x: Number.MAX_VALUE, y: Number.MAX_VALUE }
        const max = { x: -Number.MAX_VALUE, y: -Number.MAX_VALUE }
        list.forEach(v => {
            min.x = Math.min(min.x, v.x)
            min.y = Math.min(min.y, v.y)
            max.x = Math.max(max.x, v.x)
            max.y = Math.max(max.y, v.y)
        })
        return { min: new Point(min.x, min.y), max: new Point(max.x, max.y) }
    }

    isConstrainedEdge(a: Vertex, b: Vertex): boolean {
        const i = this.topo.indexOf(a)
        const j = this.topo.indexOf(b)
        return i !== undefined && j !== undefined && this.topo.isConstrained(i, j)
    }

    /**
     * The constraint whose interior holds (x, y), undefined outside every
     * constraint or outside the mesh. Points on an edge report the region of
     * the triangle on its left.
     */
    getRegionConstraint(x: number, y: number): PolygonConstraint | undefined {
        if (!this.topo.isBootstrapped) {
            return undefined
        }
        const loc = this.topo.locate({ x, y }, false)
        if (loc.kind === 'triangle') {
            return this.getTriangle(loc.triangle).region
        }
        if (loc.kind === 'edge') {
            return this.getTriangle(Math.floor(loc.edge / 3)).region
        }
        return undefined
    }
}
