export { cdt } from './cdt'
export type { CdtOptions } from './cdt'
export { collect, isInteriorTriangle, visitSimpleTriangles, visitTrianglesConstrained } from './collector'
export type { CollectOrder, TrianglePredicate, TriangleVisitor } from './collector'
export { PolygonConstraint } from './constraints'
export {
    Point, Vertex, inCircle, inCircleDet, isOnSegment, isQuadConvex, orient, orientation, segmentsCross, segmentsIntersect, signedArea
} from './geom'
export type { CirclePosition, GeomEdge, Orientation, XY } from './geom'
export { IntegrityCheck } from './integrity'
export type { ConstraintView } from './integrity'
export { printToLog } from './log'
export type { Logger } from './log'
export { Mesh } from './mesh'
export type { Bounds, MeshOptions, MeshTriangle } from './mesh'
export { Serie } from './Serie'
export type { ConstrainedEdge, TopologyView } from './topology'
