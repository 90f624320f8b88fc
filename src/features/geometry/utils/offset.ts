import type { Point } from '~types/geometry';
import { GeometryError } from '@/lib/errors';
import { chordStep } from './arcs';
import {
    CHORD_TOLERANCE_MM,
    EPSILON,
    closeRing,
    findSelfIntersection,
    openRing,
    samePoint,
    signedArea,
} from './polygon';

export type JoinStyle = 'round' | 'miter';

export interface OffsetOptions {
    join?: JoinStyle;
    tolerance?: number;
    // Names the contour in errors.
    label?: string;
}

interface OffsetEdge {
    from: Point;
    to: Point;
    dir: Point;
    // Edge displaced by the offset distance.
    a: Point;
    b: Point;
}

type Join =
    | { kind: 'gap'; turn: number }
    | { kind: 'overlap'; point: Point };

const MITER_LIMIT = 4;
const MAX_CLEANUP_ROUNDS = 64;

const cross = (u: Point, v: Point): number => u.x * v.y - u.y * v.x;
const dot = (u: Point, v: Point): number => u.x * v.x + u.y * v.y;

const intersectLines = (p: Point, u: Point, q: Point, v: Point): Point | null => {
    const denominator = cross(u, v);
    if (Math.abs(denominator) < 1e-12) return null;
    const t = cross({ x: q.x - p.x, y: q.y - p.y }, v) / denominator;
    return { x: p.x + t * u.x, y: p.y + t * u.y };
};

const buildEdges = (points: Point[], distance: number): OffsetEdge[] =>
    points.map((from, i) => {
        const to = points[(i + 1) % points.length];
        const length = Math.hypot(to.x - from.x, to.y - from.y);
        const dir = { x: (to.x - from.x) / length, y: (to.y - from.y) / length };
        // Right-hand normal: outward for a counter-clockwise ring.
        const nx = dir.y * distance;
        const ny = -dir.x * distance;
        return { from, to, dir, a: { x: from.x + nx, y: from.y + ny }, b: { x: to.x + nx, y: to.y + ny } };
    });

const resolveJoin = (current: OffsetEdge, next: OffsetEdge, distance: number): Join => {
    const sine = cross(current.dir, next.dir);
    const cosine = dot(current.dir, next.dir);
    if (Math.abs(sine) <= 1e-12) {
        if (cosine > 0) {
            return { kind: 'overlap', point: { x: (current.b.x + next.a.x) / 2, y: (current.b.y + next.a.y) / 2 } };
        }
        return { kind: 'gap', turn: Math.sign(distance) * Math.PI };
    }
    if (sine * distance > 0) {
        return { kind: 'gap', turn: Math.atan2(sine, cosine) };
    }
    const point = intersectLines(current.a, current.dir, next.a, next.dir);
    return { kind: 'overlap', point: point ?? current.b };
};

const resolveJoins = (edges: OffsetEdge[], distance: number): Join[] =>
    edges.map((edge, i) => resolveJoin(edge, edges[(i + 1) % edges.length], distance));

// Offset edges whose displaced span runs against their original direction.
const findInvertedEdges = (edges: OffsetEdge[], joins: Join[]): Set<number> => {
    const inverted = new Set<number>();
    edges.forEach((edge, i) => {
        const before = joins[(i - 1 + edges.length) % edges.length];
        const after = joins[i];
        const start = before.kind === 'overlap' ? before.point : edge.a;
        const end = after.kind === 'overlap' ? after.point : edge.b;
        if (dot({ x: end.x - start.x, y: end.y - start.y }, edge.dir) < -1e-9) {
            inverted.add(i);
        }
    });
    return inverted;
};

/**
 * Vertices of a fillet whose chords are tangent to the circle of radius
 * |distance| around `center`, so a second offset back by the same distance
 * lands on `center` again.
 */
const filletPoints = (center: Point, from: Point, turn: number, radius: number, tolerance: number): Point[] => {
    const steps = Math.max(1, Math.ceil(Math.abs(turn) / chordStep(radius, tolerance)));
    const step = turn / steps;
    const reach = radius / Math.cos(step / 2);
    const startAngle = Math.atan2(from.y - center.y, from.x - center.x);
    const points: Point[] = [];
    for (let i = 0; i < steps; i++) {
        const angle = startAngle + step * (i + 0.5);
        points.push({ x: center.x + reach * Math.cos(angle), y: center.y + reach * Math.sin(angle) });
    }
    return points;
};

const gapPoints = (
    current: OffsetEdge,
    next: OffsetEdge,
    turn: number,
    distance: number,
    join: JoinStyle,
    tolerance: number
): Point[] => {
    const vertex = current.to;
    if (!samePoint(vertex, next.from)) {
        return [current.b, next.a];
    }
    if (join === 'miter' && Math.abs(turn) < Math.PI * 0.95) {
        const tip = intersectLines(current.a, current.dir, next.a, next.dir);
        if (tip && Math.hypot(tip.x - vertex.x, tip.y - vertex.y) <= MITER_LIMIT * Math.abs(distance)) {
            return [tip];
        }
        return [current.b, next.a];
    }
    return [current.b, ...filletPoints(vertex, current.b, turn, Math.abs(distance), tolerance), next.a];
};

/**
 * Buffers a ring by a signed distance. Positive distances move every edge to
 * the right of its direction of travel, which grows a counter-clockwise ring.
 * Corners where the moved edges part get a fillet (or a miter); corners where
 * they overlap are trimmed to the intersection. Edges that invert are dropped
 * and their neighbours re-joined. The result keeps the input's winding and
 * never crosses itself, otherwise a GeometryError is thrown.
 *
 * A two-way open path (there and back) yields the outline of a stroke.
 */
export const offsetRing = (ring: Point[], distance: number, options: OffsetOptions = {}): Point[] => {
    const label = options.label ?? 'ring';
    const join = options.join ?? 'round';
    const tolerance = options.tolerance ?? CHORD_TOLERANCE_MM;
    const points = openRing(ring);

    if (points.length < 2) {
        throw new GeometryError(label, 'at least two distinct points are needed to offset');
    }
    if (Math.abs(distance) <= EPSILON) {
        return closeRing(points);
    }

    const sourceArea = signedArea(points);
    let expectedSign: number;
    if (Math.abs(sourceArea) > EPSILON) {
        expectedSign = Math.sign(sourceArea);
    } else if (distance > 0) {
        expectedSign = 1;
    } else {
        throw new GeometryError(label, 'an open path can only be offset outward');
    }

    const minimumEdges = points.length >= 3 ? 3 : 2;
    let edges = buildEdges(points, distance);
    let joins = resolveJoins(edges, distance);

    for (let round = 0; ; round++) {
        const inverted = findInvertedEdges(edges, joins);
        if (inverted.size === 0) break;
        edges = edges.filter((_, i) => !inverted.has(i));
        if (edges.length < minimumEdges || round >= MAX_CLEANUP_ROUNDS) {
            throw new GeometryError(label, `offset of ${distance.toFixed(4)} mm collapses the contour`);
        }
        joins = resolveJoins(edges, distance);
    }

    const output: Point[] = [];
    joins.forEach((joint, i) => {
        if (joint.kind === 'overlap') {
            output.push(joint.point);
        } else {
            output.push(...gapPoints(edges[i], edges[(i + 1) % edges.length], joint.turn, distance, join, tolerance));
        }
    });

    const result = closeRing(output);
    if (openRing(result).length < 3) {
        throw new GeometryError(label, `offset of ${distance.toFixed(4)} mm collapses the contour`);
    }

    const area = signedArea(result);
    if (Math.sign(area) !== expectedSign || Math.abs(area) <= EPSILON) {
        throw new GeometryError(label, `offset of ${distance.toFixed(4)} mm inverts the contour winding`);
    }
    const crossing = findSelfIntersection(result);
    if (crossing) {
        throw new GeometryError(label, `offset of ${distance.toFixed(4)} mm makes the contour cross itself (edges ${crossing[0]} and ${crossing[1]})`);
    }
    return result;
};

/**
 * Outline of an open polyline swept by a round pen of the given width.
 */
export const bufferPath = (path: Point[], width: number, options: OffsetOptions = {}): Point[] => {
    const points = openRing(path);
    if (points.length < 2) {
        throw new GeometryError(options.label ?? 'path', 'a stroke needs two distinct points');
    }
    const there = points;
    const back = points.slice(1, -1).reverse();
    return offsetRing([...there, ...back], width / 2, { ...options, join: 'round' });
};
