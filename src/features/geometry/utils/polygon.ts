import type { Bounds, Point, Winding } from '~types/geometry';

export const EPSILON = 1e-9;

// Largest distance a chord may stray from the true curve, in mm.
export const CHORD_TOLERANCE_MM = 0.002;

export const samePoint = (a: Point, b: Point, tolerance: number = 1e-7): boolean =>
    Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance;

/**
 * Ring without its closing point, consecutive duplicates removed.
 */
export const openRing = (ring: Point[]): Point[] => {
    const points: Point[] = [];
    for (const point of ring) {
        if (points.length === 0 || !samePoint(points[points.length - 1], point)) {
            points.push(point);
        }
    }
    while (points.length > 1 && samePoint(points[0], points[points.length - 1])) {
        points.pop();
    }
    return points;
};

export const closeRing = (points: Point[]): Point[] => {
    const open = openRing(points);
    return open.length === 0 ? [] : [...open, { ...open[0] }];
};

export const signedArea = (ring: Point[]): number => {
    const points = openRing(ring);
    let sum = 0;
    for (let i = 0; i < points.length; i++) {
        const a = points[i];
        const b = points[(i + 1) % points.length];
        sum += a.x * b.y - b.x * a.y;
    }
    return sum / 2;
};

export const windingOf = (ring: Point[]): Winding => (signedArea(ring) >= 0 ? 'ccw' : 'cw');

export const toCounterClockwise = (ring: Point[]): Point[] =>
    windingOf(ring) === 'ccw' ? closeRing(ring) : closeRing([...ring].reverse());

export const boundsOf = (points: Iterable<Point>): Bounds => {
    let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
    for (const { x, y } of points) {
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;
    }
    return { minX, minY, maxX, maxY };
};

export const mergeBounds = (a: Bounds, b: Bounds): Bounds => ({
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY),
});

export const boundsContain = (outer: Bounds, inner: Bounds, tolerance: number = 1e-7): boolean =>
    inner.minX >= outer.minX - tolerance &&
    inner.minY >= outer.minY - tolerance &&
    inner.maxX <= outer.maxX + tolerance &&
    inner.maxY <= outer.maxY + tolerance;

/**
 * Even-odd ray casting. Points exactly on an edge may land either way.
 */
export const pointInRing = (point: Point, ring: Point[]): boolean => {
    const points = openRing(ring);
    let inside = false;
    for (let i = 0, j = points.length - 1; i < points.length; j = i++) {
        const a = points[i];
        const b = points[j];
        if ((a.y > point.y) !== (b.y > point.y)) {
            const crossX = a.x + ((point.y - a.y) * (b.x - a.x)) / (b.y - a.y);
            if (point.x < crossX) inside = !inside;
        }
    }
    return inside;
};

/**
 * X positions where the horizontal line at `y` crosses the ring, sorted.
 */
export const scanlineCrossings = (ring: Point[], y: number): number[] => {
    const points = openRing(ring);
    const crossings: number[] = [];
    for (let i = 0; i < points.length; i++) {
        const a = points[i];
        const b = points[(i + 1) % points.length];
        if ((a.y > y) !== (b.y > y)) {
            crossings.push(a.x + ((y - a.y) * (b.x - a.x)) / (b.y - a.y));
        }
    }
    return crossings.sort((p, q) => p - q);
};

/**
 * A point strictly inside the ring: the middle of the widest span on a
 * scanline through the middle of the bounding box.
 */
export const interiorPoint = (ring: Point[]): Point | null => {
    const points = openRing(ring);
    if (points.length < 3) return null;
    const { minY, maxY } = boundsOf(points);
    const height = maxY - minY;
    if (height <= EPSILON) return null;

    // Step off any vertex height so the scanline never grazes a vertex.
    let y = minY + height / 2;
    for (let attempt = 0; attempt < 8 && points.some((p) => Math.abs(p.y - y) <= EPSILON); attempt++) {
        y += height * 0.0123 * (attempt + 1);
    }

    const crossings = scanlineCrossings(points, y);
    let best: Point | null = null;
    let widest = 0;
    for (let i = 0; i + 1 < crossings.length; i += 2) {
        const width = crossings[i + 1] - crossings[i];
        if (width > widest) {
            widest = width;
            best = { x: (crossings[i] + crossings[i + 1]) / 2, y };
        }
    }
    return best;
};

const orientation = (a: Point, b: Point, c: Point): number =>
    (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);

/**
 * True when segments ab and cd cross or touch away from shared endpoints.
 */
export const segmentsIntersect = (a: Point, b: Point, c: Point, d: Point): boolean => {
    const d1 = orientation(c, d, a);
    const d2 = orientation(c, d, b);
    const d3 = orientation(a, b, c);
    const d4 = orientation(a, b, d);
    const scale = Math.max(
        Math.hypot(b.x - a.x, b.y - a.y),
        Math.hypot(d.x - c.x, d.y - c.y),
        1
    );
    const tolerance = EPSILON * scale * scale;

    if (((d1 > tolerance && d2 < -tolerance) || (d1 < -tolerance && d2 > tolerance)) &&
        ((d3 > tolerance && d4 < -tolerance) || (d3 < -tolerance && d4 > tolerance))) {
        return true;
    }

    const onSegment = (p: Point, q: Point, r: Point, side: number): boolean =>
        Math.abs(side) <= tolerance &&
        r.x >= Math.min(p.x, q.x) - 1e-9 && r.x <= Math.max(p.x, q.x) + 1e-9 &&
        r.y >= Math.min(p.y, q.y) - 1e-9 && r.y <= Math.max(p.y, q.y) + 1e-9;

    return onSegment(c, d, a, d1) || onSegment(c, d, b, d2) || onSegment(a, b, c, d3) || onSegment(a, b, d, d4);
};

/**
 * Index pair of the first two non-adjacent ring edges that meet, if any.
 */
export const findSelfIntersection = (ring: Point[]): [number, number] | null => {
    const points = openRing(ring);
    const n = points.length;
    if (n < 4) return null;
    const boxes = points.map((p, i) => boundsOf([p, points[(i + 1) % n]]));
    for (let i = 0; i < n; i++) {
        for (let j = i + 1; j < n; j++) {
            // Neighbouring edges share a vertex.
            if (j === i + 1 || (i === 0 && j === n - 1)) continue;
            const a = boxes[i];
            const b = boxes[j];
            if (a.maxX < b.minX - 1e-9 || b.maxX < a.minX - 1e-9 || a.maxY < b.minY - 1e-9 || b.maxY < a.minY - 1e-9) {
                continue;
            }
            if (segmentsIntersect(points[i], points[(i + 1) % n], points[j], points[(j + 1) % n])) {
                return [i, j];
            }
        }
    }
    return null;
};
