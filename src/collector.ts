// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { Vertex } from './geom'
import type { Mesh, MeshTriangle } from './mesh'

export type TrianglePredicate = (t: MeshTriangle) => boolean

export type TriangleVisitor = (vertices: [Vertex, Vertex, Vertex]) => void

/**
 * `index` scans the triangles in storage order, `breadth-first` walks the
 * adjacency of each connected group of qualifying triangles.
 */
export type CollectOrder = 'index' | 'breadth-first'

/** The triangle lies inside a region constraint, not in a hole */
export const isInteriorTriangle: TrianglePredicate = t => t.region !== undefined && !t.region.isHole

/**
 * Call `visit` once with the counter-clockwise vertices of every triangle
 * accepted by `predicate`. The mesh is only read.
 * @returns the number of visited triangles
 */
export function collect(mesh: Mesh, predicate: TrianglePredicate, visit: TriangleVisitor, order: CollectOrder = 'index'): number {
    const nTri = mesh.getTriangleCount()
    let count = 0

    if (order === 'index') {
        for (let t = 0; t < nTri; t++) {
            const tri = mesh.getTriangle(t)
            if (predicate(tri)) {
                visit(tri.vertices)
                count++
            }
        }
        return count
    }

    const twins = mesh.topology.twins
    const seen = new Array<boolean>(nTri).fill(false)
    for (let start = 0; start < nTri; start++) {
        if (seen[start]) {
            continue
        }
        seen[start] = true
        const first = mesh.getTriangle(start)
        if (!predicate(first)) {
            continue
        }

        const queue = [first]
        for (let head = 0; head < queue.length; head++) {
            const tri = queue[head]
            visit(tri.vertices)
            count++
            for (let j = 0; j < 3; j++) {
                const f = twins[3 * tri.index + j]
                if (f === -1) {
                    continue
                }
                const n = Math.floor(f / 3)
                if (seen[n]) {
                    continue
                }
                seen[n] = true
                const neighbor = mesh.getTriangle(n)
                if (predicate(neighbor)) {
                    queue.push(neighbor)
                }
            }
        }
    }
    return count
}

/**
 * Visit the triangles enclosed by region constraints (holes excluded).
 */
export function visitTrianglesConstrained(mesh: Mesh, visit: TriangleVisitor, order: CollectOrder = 'index'): number {
    return collect(mesh, isInteriorTriangle, visit, order)
}

/** Visit every triangle of the mesh */
export function visitSimpleTriangles(mesh: Mesh, visit: TriangleVisitor, order: CollectOrder = 'index'): number {
    return collect(mesh, () => true, visit, order)
}
