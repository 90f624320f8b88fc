import polygonClipping from 'polygon-clipping';
import type {
    Aperture,
    ApertureTransform,
    MacroPart,
    Point,
    Polarity,
    Polygon,
    Primitive,
    SourceLocation,
} from '~types/geometry';
import { GeometryError, describeLocation } from '@/lib/errors';
import { circleRing } from './arcs';
import { bufferPath, offsetRing } from './offset';
import {
    EPSILON,
    closeRing,
    findSelfIntersection,
    openRing,
    samePoint,
    signedArea,
    toCounterClockwise,
    windingOf,
} from './polygon';

export interface BuiltGeometry {
    polygons: Polygon[];
    notices: string[];
}

const toPolygon = (
    ring: Point[],
    polarity: Polarity,
    origin: SourceLocation,
    role: Polygon['role'] = 'artwork'
): Polygon => {
    const closed = closeRing(ring);
    if (openRing(closed).length < 3 || Math.abs(signedArea(closed)) <= EPSILON) {
        throw new GeometryError(describeLocation(origin), 'polygon has zero area');
    }
    return { ring: closed, winding: windingOf(closed), polarity, role, origin };
};

const translate = (ring: Point[], by: Point): Point[] => ring.map((p) => ({ x: p.x + by.x, y: p.y + by.y }));

const opposite = (polarity: Polarity): Polarity => (polarity === 'dark' ? 'clear' : 'dark');

/**
 * Mirror, then rotate, then scale a point of an aperture image about its origin.
 */
export const transformPoint = (point: Point, transform: ApertureTransform): Point => {
    const x = transform.mirrorX ? -point.x : point.x;
    const y = transform.mirrorY ? -point.y : point.y;
    const angle = (transform.rotation * Math.PI) / 180;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return {
        x: (x * cos - y * sin) * transform.scale,
        y: (x * sin + y * cos) * transform.scale,
    };
};

const placeRing = (ring: Point[], position: Point, transform?: ApertureTransform): Point[] =>
    translate(transform ? ring.map((p) => transformPoint(p, transform)) : ring, position);

const rectangleRing = (width: number, height: number): Point[] => {
    const w = width / 2;
    const h = height / 2;
    return [{ x: -w, y: -h }, { x: w, y: -h }, { x: w, y: h }, { x: -w, y: h }, { x: -w, y: -h }];
};

const obroundRing = (width: number, height: number, label: string): Point[] => {
    if (Math.abs(width - height) <= EPSILON) {
        return circleRing({ x: 0, y: 0 }, width);
    }
    // Stadium: a segment along the long axis, buffered by half the short side.
    const short = Math.min(width, height);
    const half = (Math.max(width, height) - short) / 2;
    const segment = width > height
        ? [{ x: -half, y: 0 }, { x: half, y: 0 }]
        : [{ x: 0, y: -half }, { x: 0, y: half }];
    return bufferPath(segment, short, { label });
};

const regularPolygonRing = (outerDiameter: number, vertices: number, rotation: number): Point[] => {
    const radius = outerDiameter / 2;
    const start = (rotation * Math.PI) / 180;
    const ring: Point[] = [];
    for (let i = 0; i < vertices; i++) {
        const angle = start + (2 * Math.PI * i) / vertices;
        ring.push({ x: radius * Math.cos(angle), y: radius * Math.sin(angle) });
    }
    return closeRing(ring);
};

type StandardAperture = Exclude<Aperture, { shape: 'macro' }>;

/**
 * Outline of an aperture centred on the origin.
 */
export const apertureRing = (aperture: StandardAperture, label: string): Point[] => {
    switch (aperture.shape) {
        case 'circle':
            return circleRing({ x: 0, y: 0 }, aperture.diameter);
        case 'rectangle':
            return rectangleRing(aperture.width, aperture.height);
        case 'obround':
            return obroundRing(aperture.width, aperture.height, label);
        case 'polygon':
            return regularPolygonRing(aperture.outerDiameter, aperture.vertices, aperture.rotation);
    }
};

type ClipPair = [number, number];
type ClipMultiPolygon = ClipPair[][][];

const toClipRing = (ring: Point[]): ClipPair[] => closeRing(ring).map((p): ClipPair => [p.x, p.y]);

/**
 * Flattens the parts of a macro into disjoint polygons with holes. Each part
 * is added to or cut from what the earlier parts drew.
 */
const macroImage = (parts: MacroPart[], position: Point, transform?: ApertureTransform): ClipMultiPolygon => {
    let image: ClipMultiPolygon = [];
    for (const part of parts) {
        const ring = toClipRing(placeRing(part.ring, position, transform));
        if (ring.length < 4) continue;
        if (part.polarity === 'dark') {
            image = image.length === 0 ? polygonClipping.union([[ring]]) : polygonClipping.union(image, [[ring]]);
        } else if (image.length > 0) {
            image = polygonClipping.difference(image, [[ring]]);
        }
    }
    return image;
};

/**
 * Joins strokes end to end into chains.
 */
const chainPaths = (paths: Point[][]): Point[][] => {
    const pending = paths.map((path) => [...path]);
    const chains: Point[][] = [];
    while (pending.length > 0) {
        const chain = pending.shift() ?? [];
        let extended = true;
        while (extended && !samePoint(chain[0], chain[chain.length - 1], 1e-6)) {
            extended = false;
            for (let i = 0; i < pending.length; i++) {
                const candidate = pending[i];
                const head = candidate[0];
                const tail = candidate[candidate.length - 1];
                const end = chain[chain.length - 1];
                if (samePoint(end, head, 1e-6)) {
                    chain.push(...candidate.slice(1));
                } else if (samePoint(end, tail, 1e-6)) {
                    chain.push(...[...candidate].reverse().slice(1));
                } else {
                    continue;
                }
                pending.splice(i, 1);
                extended = true;
                break;
            }
        }
        chains.push(chain);
    }
    return chains;
};

interface Hairline {
    path: Point[];
    polarity: Polarity;
    location: SourceLocation;
}

interface WideStroke extends Hairline {
    width: number;
}

// Location of the stroke a chain starts with.
const originOf = (group: Hairline[], start: Point): SourceLocation =>
    group.find((h) => samePoint(h.path[0], start, 1e-6))?.location ?? group[0].location;

const apertureExtent = (aperture: Aperture): number => {
    switch (aperture.shape) {
        case 'circle':
            return aperture.diameter;
        case 'rectangle':
        case 'obround':
            return aperture.width * aperture.height;
        case 'polygon':
            return aperture.outerDiameter;
        case 'macro':
            return aperture.parts.length;
    }
};

export class GeometryBuilder {
    private readonly polygons: Polygon[] = [];
    private readonly notices: string[] = [];
    private hairlines: Hairline[] = [];
    private wideStrokes: WideStroke[] = [];

    build(primitives: Primitive[]): BuiltGeometry {
        for (const primitive of primitives) {
            switch (primitive.kind) {
                case 'flash':
                    this.flash(primitive.aperture, primitive.position, primitive.polarity, primitive.location, primitive.transform);
                    break;
                case 'stroke':
                    this.stroke(primitive.aperture, primitive.path, primitive.polarity, primitive.location, primitive.transform);
                    break;
                case 'region':
                    this.region(primitive.ring, primitive.polarity, primitive.location);
                    break;
                case 'drill':
                    this.drill(primitive.diameter, primitive.position, primitive.location);
                    break;
            }
        }
        this.closeWideStrokes();
        this.closeHairlines();
        return { polygons: this.polygons, notices: this.notices };
    }

    private flash(
        aperture: Aperture,
        position: Point,
        polarity: Polarity,
        location: SourceLocation,
        transform?: ApertureTransform
    ): void {
        const label = describeLocation(location);
        if (apertureExtent(aperture) <= EPSILON) {
            this.notices.push(`${label}: flash of empty aperture D${aperture.code} skipped`);
            return;
        }
        if (aperture.shape === 'macro') {
            this.macroFlash(aperture.parts, position, polarity, location, transform);
            return;
        }
        this.polygons.push(toPolygon(placeRing(apertureRing(aperture, label), position, transform), polarity, location));
        if (aperture.holeDiameter !== undefined && polarity === 'dark') {
            const hole = aperture.holeDiameter * (transform?.scale ?? 1);
            this.polygons.push(toPolygon(circleRing(position, hole), 'clear', location));
        }
    }

    private macroFlash(
        parts: MacroPart[],
        position: Point,
        polarity: Polarity,
        location: SourceLocation,
        transform?: ApertureTransform
    ): void {
        const image = macroImage(parts, position, transform);
        if (image.length === 0) {
            this.notices.push(`${describeLocation(location)}: aperture macro draws nothing, flash skipped`);
            return;
        }
        for (const [outer, ...holes] of image) {
            this.polygons.push(toPolygon(outer.map(([x, y]) => ({ x, y })), polarity, location));
            for (const hole of holes) {
                this.polygons.push(toPolygon(hole.map(([x, y]) => ({ x, y })), opposite(polarity), location));
            }
        }
    }

    private stroke(
        aperture: Aperture,
        path: Point[],
        polarity: Polarity,
        location: SourceLocation,
        transform?: ApertureTransform
    ): void {
        const width = aperture.shape === 'circle' ? aperture.diameter * (transform?.scale ?? 1) : 0;
        const points = openRing(path);

        if (width <= EPSILON) {
            if (points.length >= 2) {
                this.hairlines.push({ path, polarity, location });
            }
            return;
        }
        if (points.length < 2) {
            // A zero-length stroke leaves the aperture's dot.
            this.flash(aperture, path[0], polarity, location, transform);
            return;
        }

        const closed = path.length > 3 && samePoint(path[0], path[path.length - 1], 1e-6);
        if (closed) {
            this.closedStroke(points, width, polarity, location);
            return;
        }
        // Open strokes wait for their neighbours: an outline drawn segment by segment is one ribbon.
        this.wideStrokes.push({ path, width, polarity, location });
    }

    private openStroke(path: Point[], width: number, polarity: Polarity, location: SourceLocation): void {
        try {
            this.polygons.push(toPolygon(bufferPath(path, width, { label: describeLocation(location) }), polarity, location));
        } catch (err) {
            if (!(err instanceof GeometryError)) throw err;
            this.segmentStadiums(path, width, polarity, location);
        }
    }

    private closedStroke(points: Point[], width: number, polarity: Polarity, location: SourceLocation): void {
        const label = describeLocation(location);
        const ring = toCounterClockwise(closeRing(points));
        let outer: Point[];
        try {
            outer = offsetRing(ring, width / 2, { label });
        } catch (err) {
            if (!(err instanceof GeometryError)) throw err;
            this.segmentStadiums(closeRing(points), width, polarity, location);
            return;
        }
        this.polygons.push(toPolygon(outer, polarity, location));

        try {
            const inner = offsetRing(ring, -width / 2, { label });
            this.polygons.push(toPolygon(inner, opposite(polarity), location));
        } catch (err) {
            if (!(err instanceof GeometryError)) throw err;
            this.notices.push(`${label}: closed stroke is wider than its opening, filled solid`);
        }
    }

    private segmentStadiums(path: Point[], width: number, polarity: Polarity, location: SourceLocation): void {
        const label = describeLocation(location);
        for (let i = 0; i + 1 < path.length; i++) {
            if (samePoint(path[i], path[i + 1])) continue;
            this.polygons.push(toPolygon(bufferPath([path[i], path[i + 1]], width, { label }), polarity, location));
        }
        this.notices.push(`${label}: self-crossing stroke split into ${path.length - 1} segments`);
    }

    private region(ring: Point[], polarity: Polarity, location: SourceLocation): void {
        const crossing = findSelfIntersection(ring);
        if (crossing) {
            throw new GeometryError(
                describeLocation(location),
                `region boundary crosses itself (edges ${crossing[0]} and ${crossing[1]})`
            );
        }
        this.polygons.push(toPolygon(ring, polarity, location));
    }

    private drill(diameter: number, position: Point, location: SourceLocation): void {
        const polygon = toPolygon(circleRing(position, diameter), 'dark', location, 'drill');
        this.polygons.push({ ...polygon, circle: { center: { ...position }, diameter } });
    }

    private closeWideStrokes(): void {
        const groups = new Map<string, WideStroke[]>();
        for (const stroke of this.wideStrokes) {
            const key = `${stroke.polarity}:${stroke.width}`;
            const group = groups.get(key) ?? [];
            group.push(stroke);
            groups.set(key, group);
        }
        this.wideStrokes = [];

        for (const group of groups.values()) {
            const { width, polarity } = group[0];
            for (const chain of chainPaths(group.map((s) => s.path))) {
                const origin = originOf(group, chain[0]);
                if (chain.length > 3 && samePoint(chain[0], chain[chain.length - 1], 1e-6)) {
                    this.closedStroke(openRing(chain), width, polarity, origin);
                } else {
                    this.openStroke(chain, width, polarity, origin);
                }
            }
        }
    }

    private closeHairlines(): void {
        const byPolarity: Record<Polarity, Hairline[]> = { dark: [], clear: [] };
        for (const hairline of this.hairlines) {
            byPolarity[hairline.polarity].push(hairline);
        }
        this.hairlines = [];

        for (const polarity of ['dark', 'clear'] as const) {
            const group = byPolarity[polarity];
            if (group.length === 0) continue;
            const chains = chainPaths(group.map((h) => h.path));
            for (const chain of chains) {
                const start = chain[0];
                const origin = originOf(group, start);
                if (!samePoint(start, chain[chain.length - 1], 1e-6)) {
                    throw new GeometryError(
                        describeLocation(origin),
                        `zero-width outline starting at (${start.x.toFixed(4)}, ${start.y.toFixed(4)}) mm is not closed`
                    );
                }
                const crossing = findSelfIntersection(chain);
                if (crossing) {
                    throw new GeometryError(describeLocation(origin), 'zero-width outline crosses itself');
                }
                this.polygons.push(toPolygon(chain, polarity, origin));
            }
        }
    }
}

export const buildPolygons = (primitives: Primitive[]): BuiltGeometry => new GeometryBuilder().build(primitives);
