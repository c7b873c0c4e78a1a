// Constrained Delaunay Triangulation code in JavaScript
// Copyright 2018 Savithru Jayasinghe
// Licensed under the MIT License (LICENSE.txt)
// https://github.com/savithru-j/cdt-js/tree/master

import { incircle, orient2d } from 'robust-predicates'

export interface XY {
    readonly x: number
    readonly y: number
}

export type GeomEdge = [XY, XY]

export type Orientation = 'left' | 'right' | 'collinear'

export type CirclePosition = 'inside' | 'on' | 'outside'

export class Point implements XY {
    readonly x: number
    readonly y: number

    constructor(x: number, y: number) {
        this.x = x
        this.y = y
    }

    toStr(): string {
        return "(" + this.x.toFixed(3) + ", " + this.y.toFixed(3) + ")"
    }
}

/**
 * A mesh vertex. Identity matters: two vertices at the same place are still
 * two objects, the mesh merges the later one into the earlier.
 */
export class Vertex extends Point {
    readonly z: number
    /** Created by the mesh itself (conformity splits), not by the caller */
    readonly synthetic: boolean

    constructor(x: number, y: number, z = 0, synthetic = false) {
        super(x, y)
        this.z = z
        this.synthetic = synthetic
    }

    toStr(): string {
        return "(" + this.x.toFixed(3) + ", " + this.y.toFixed(3) + ", " + this.z.toFixed(3) + ")"
    }
}

/**
 * Exact orientation of the turn a -> b -> c.
 * Positive for a counter-clockwise (left) turn, negative for a clockwise one,
 * zero when the three points are collinear.
 */
export function orient(a: XY, b: XY, c: XY): number {
    // robust-predicates counts clockwise turns as positive
    return -orient2d(a.x, a.y, b.x, b.y, c.x, c.y)
}

export function orientation(a: XY, b: XY, c: XY): Orientation {
    const o = orient(a, b, c)
    if (o > 0) {
        return 'left'
    }
    return o < 0 ? 'right' : 'collinear'
}

/**
 * Positive when d lies strictly inside the circle through a, b and c, negative
 * when outside, zero when the four points are cocircular or a, b, c are
 * collinear. Independent of the winding of a, b, c.
 */
export function inCircleDet(a: XY, b: XY, c: XY, d: XY): number {
    const o = orient(a, b, c)
    if (o === 0) {
        return 0
    }
    const det = incircle(a.x, a.y, b.x, b.y, c.x, c.y, d.x, d.y)
    return o > 0 ? det : -det
}

export function inCircle(a: XY, b: XY, c: XY, d: XY): CirclePosition {
    const det = inCircleDet(a, b, c, d)
    if (det > 0) {
        return 'inside'
    }
    return det < 0 ? 'outside' : 'on'
}

export function sqDistance(p0: XY, p1: XY): number {
    return (p0.x - p1.x) * (p0.x - p1.x) + (p0.y - p1.y) * (p0.y - p1.y)
}

/**
 * True when p lies on the open segment a-b (collinear, strictly between the
 * endpoints).
 */
export function isOnSegment(a: XY, b: XY, p: XY): boolean {
    if (orient(a, b, p) !== 0) {
        return false
    }
    const abx = b.x - a.x
    const aby = b.y - a.y
    const t = (p.x - a.x) * abx + (p.y - a.y) * aby
    return t > 0 && t < abx * abx + aby * aby
}

/**
 * Proper crossing: the segments meet in a single point interior to both.
 */
export function segmentsCross(edgeA: GeomEdge, edgeB: GeomEdge): boolean {
    const AxB0 = orient(edgeA[0], edgeA[1], edgeB[0])
    const AxB1 = orient(edgeA[0], edgeA[1], edgeB[1])
    if (!((AxB0 > 0 && AxB1 < 0) || (AxB0 < 0 && AxB1 > 0))) {
        return false
    }

    const BxA0 = orient(edgeB[0], edgeB[1], edgeA[0])
    const BxA1 = orient(edgeB[0], edgeB[1], edgeA[1])
    return (BxA0 > 0 && BxA1 < 0) || (BxA0 < 0 && BxA1 > 0)
}

/**
 * Closed-segment intersection: touching endpoints and collinear overlaps
 * count as intersecting.
 */
export function segmentsIntersect(edgeA: GeomEdge, edgeB: GeomEdge): boolean {
    const AxB0 = orient(edgeA[0], edgeA[1], edgeB[0])
    const AxB1 = orient(edgeA[0], edgeA[1], edgeB[1])

    //Check if the endpoints of edgeB are on the same side of edgeA
    if ((AxB0 > 0 && AxB1 > 0) || (AxB0 < 0 && AxB1 < 0)) {
        return false
    }

    const BxA0 = orient(edgeB[0], edgeB[1], edgeA[0])
    const BxA1 = orient(edgeB[0], edgeB[1], edgeA[1])

    //Check if the endpoints of edgeA are on the same side of edgeB
    if ((BxA0 > 0 && BxA1 > 0) || (BxA0 < 0 && BxA1 < 0)) {
        return false
    }

    //Special case of colinear edges
    if (AxB0 === 0 && AxB1 === 0) {
        //Separated in x
        if ((Math.max(edgeB[0].x, edgeB[1].x) < Math.min(edgeA[0].x, edgeA[1].x)) ||
            (Math.min(edgeB[0].x, edgeB[1].x) > Math.max(edgeA[0].x, edgeA[1].x))) {
            return false
        }

        //Separated in y
        if ((Math.max(edgeB[0].y, edgeB[1].y) < Math.min(edgeA[0].y, edgeA[1].y)) ||
            (Math.min(edgeB[0].y, edgeB[1].y) > Math.max(edgeA[0].y, edgeA[1].y))) {
            return false
        }
    }

    return true
}

/**
 * The quad p0, p1, p2, p3 is strictly convex when its diagonals cross properly.
 */
export function isQuadConvex(p0: XY, p1: XY, p2: XY, p3: XY): boolean {
    return segmentsCross([p0, p2], [p1, p3])
}

/**
 * Shoelace area, positive for a counter-clockwise loop.
 */
export function signedArea(loop: readonly XY[]): number {
    let area = 0
    for (let i = 0, j = loop.length - 1; i < loop.length; j = i++) {
        area += loop[j].x * loop[i].y - loop[i].x * loop[j].y
    }
    return area / 2
}
