// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { visitSimpleTriangles, visitTrianglesConstrained } from './collector'
import { PolygonConstraint } from './constraints'
import { Vertex } from './geom'
import { printToLog } from './log'
import { Mesh } from './mesh'
import { Serie } from './Serie'

export interface CdtOptions {
    /** A {@link Serie} of itemSize = 2 or 3 for vertex coordinates in 2D or 3D */
    positions: Serie
    /** Closed polygons given as loops of position indices */
    constraints?: readonly (readonly number[])[]
    /** When false, constrained edges are split until they are Delaunay */
    enforceOnly?: boolean
    /** Defaults to the bounding box diagonal over the square root of the vertex count */
    nominalPointSpacing?: number
    verbose?: boolean
}

/**
 * Generate a constrained Delaunay triangulation in 2D
 * @returns positions, with the synthetic vertices of conformity splits
 * appended, and the triangle indices (3 ids, counter-clockwise). With
 * constraints, only the triangles inside region polygons are returned.
 */
export function cdt({ positions, constraints = [], enforceOnly = true, nominalPointSpacing, verbose = false }: CdtOptions): { positions: Serie, indices: Serie } {
    const itemSize = positions.itemSize
    if (itemSize !== 2 && itemSize !== 3) {
        throw new Error('positions must be defined with itemSize = 2 or 3 (coordinates in 2D or 3D)')
    }

    const vertices = positions.map(p => new Vertex(p[0], p[1], itemSize === 3 ? p[2] : 0))
    if (vertices.length === 0) {
        if (verbose) {
            printToLog('No input vertices to triangulate.')
        }
        return { positions, indices: Serie.create({ array: [], itemSize: 3 }) }
    }

    const polygons = constraints.map((loop, i) => {
        const polygon = new PolygonConstraint()
        loop.forEach(id => {
            if (!Number.isInteger(id) || id < 0 || id >= vertices.length) {
                throw new Error(`Vertex index ${id} of constraint ${i} needs to be non-negative and less than the number of input vertices (${vertices.length}).`)
            }
            polygon.add(vertices[id])
        })
        polygon.complete()
        return polygon
    })

    const t0 = performance.now()
    const mesh = new Mesh(nominalPointSpacing ?? defaultSpacing(vertices), { verbose })
    mesh.insertAll(vertices)
    mesh.addConstraints(polygons, enforceOnly)

    const ids = new Map<Vertex, number>()
    vertices.forEach((v, i) => ids.set(v, i))
    const array = [...positions.array]
    const idOf = (v: Vertex): number => {
        const known = ids.get(v)
        if (known !== undefined) {
            return known
        }
        const id = array.length / itemSize
        array.push(...(itemSize === 3 ? [v.x, v.y, v.z] : [v.x, v.y]))
        ids.set(v, id)
        return id
    }

    const triangles: number[] = []
    const visit = (tri: [Vertex, Vertex, Vertex]) => triangles.push(...tri.map(idOf))
    const count = polygons.length > 0 ? visitTrianglesConstrained(mesh, visit) : visitSimpleTriangles(mesh, visit)

    if (verbose) {
        printToLog(`Computed cdt of ${count} triangles in ${(performance.now() - t0).toFixed(2)} ms.`)
    }

    return {
        positions: Serie.create({ array, itemSize }),
        indices: Serie.create({ array: triangles, itemSize: 3 })
    }
}

function defaultSpacing(vertices: readonly Vertex[]): number {
    let minX = Number.MAX_VALUE
    let minY = Number.MAX_VALUE
    let maxX = -Number.MAX_VALUE
    let maxY = -Number.MAX_VALUE
    vertices.forEach(v => {
        minX = Math.min(minX, v.x)
        minY = Math.min(minY, v.y)
        maxX = Math.max(maxX, v.x)
        maxY = Math.max(maxY, v.y)
    })
    const diagonal = Math.hypot(maxX - minX, maxY - minY)
    return diagonal > 0 && Number.isFinite(diagonal) ? diagonal / Math.sqrt(vertices.length) : 1
}
