import type { Point } from '~types/geometry';
import type { ArcDirection } from '~types/motion';
import { CHORD_TOLERANCE_MM, samePoint } from './polygon';

/**
 * Largest angular step whose chord stays within `tolerance` of a circle of
 * the given radius.
 */
export const chordStep = (radius: number, tolerance: number = CHORD_TOLERANCE_MM): number => {
    if (radius <= tolerance) return Math.PI / 2;
    return Math.min(Math.PI / 2, 2 * Math.acos(1 - tolerance / radius));
};

/**
 * Signed sweep from `start` to `end` around `center`; equal end points make a full turn.
 */
export const arcSweep = (start: Point, end: Point, center: Point, direction: ArcDirection): number => {
    const startAngle = Math.atan2(start.y - center.y, start.x - center.x);
    const endAngle = Math.atan2(end.y - center.y, end.x - center.x);
    let sweep = endAngle - startAngle;
    if (direction === 'ccw') {
        if (sweep <= 1e-12) sweep += 2 * Math.PI;
    } else if (sweep >= -1e-12) {
        sweep -= 2 * Math.PI;
    }
    if (samePoint(start, end)) {
        sweep = direction === 'ccw' ? 2 * Math.PI : -2 * Math.PI;
    }
    return sweep;
};

/**
 * Chord points of an arc, start excluded and `end` included exactly.
 */
export const linearizeArc = (
    start: Point,
    end: Point,
    center: Point,
    direction: ArcDirection,
    tolerance: number = CHORD_TOLERANCE_MM
): Point[] => {
    const radius = Math.hypot(start.x - center.x, start.y - center.y);
    const sweep = arcSweep(start, end, center, direction);
    const steps = Math.max(1, Math.ceil(Math.abs(sweep) / chordStep(radius, tolerance)));
    const startAngle = Math.atan2(start.y - center.y, start.x - center.x);
    const endRadius = Math.hypot(end.x - center.x, end.y - center.y);

    const points: Point[] = [];
    for (let i = 1; i < steps; i++) {
        const t = i / steps;
        // Blend the radius so slightly inconsistent arcs still meet their end point.
        const r = radius + (endRadius - radius) * t;
        const angle = startAngle + sweep * t;
        points.push({ x: center.x + r * Math.cos(angle), y: center.y + r * Math.sin(angle) });
    }
    points.push({ ...end });
    return points;
};

/**
 * Closed counter-clockwise ring with its vertices on the circle.
 */
export const circleRing = (center: Point, diameter: number, tolerance: number = CHORD_TOLERANCE_MM): Point[] => {
    const radius = diameter / 2;
    const steps = Math.max(8, Math.ceil((2 * Math.PI) / chordStep(radius, tolerance)));
    const ring: Point[] = [];
    for (let i = 0; i < steps; i++) {
        const angle = (2 * Math.PI * i) / steps;
        ring.push({ x: center.x + radius * Math.cos(angle), y: center.y + radius * Math.sin(angle) });
    }
    ring.push({ ...ring[0] });
    return ring;
};
