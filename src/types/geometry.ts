export interface Point {
    x: number;
    y: number;
}

export interface Bounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export type Polarity = 'dark' | 'clear';
export type Winding = 'ccw' | 'cw';

export interface SourceLocation {
    source: string;
    line: number;
    column: number;
}

// Aperture dimensions are in millimetres.
export type ApertureTemplate =
    | { shape: 'circle'; diameter: number; holeDiameter?: number }
    | { shape: 'rectangle'; width: number; height: number; holeDiameter?: number }
    | { shape: 'obround'; width: number; height: number; holeDiameter?: number }
    | { shape: 'polygon'; outerDiameter: number; vertices: number; rotation: number; holeDiameter?: number }
    | { shape: 'macro'; name: string; parts: MacroPart[] };

/**
 * One evaluated primitive of an aperture macro, as a ring about the flash point.
 * Clear parts erase what earlier parts drew.
 */
export interface MacroPart {
    polarity: Polarity;
    ring: Point[];
}

export type Aperture = ApertureTemplate & { code: number };

/**
 * Image transform from LM, LR and LS. Applied to aperture images about the
 * flash point in that order: mirror, rotate, scale.
 */
export interface ApertureTransform {
    mirrorX: boolean;
    mirrorY: boolean;
    // Degrees, counter-clockwise.
    rotation: number;
    scale: number;
}

export type Primitive =
    | { kind: 'flash'; aperture: Aperture; position: Point; polarity: Polarity; location: SourceLocation; transform?: ApertureTransform }
    | { kind: 'stroke'; aperture: Aperture; path: Point[]; polarity: Polarity; location: SourceLocation; transform?: ApertureTransform }
    | { kind: 'region'; ring: Point[]; polarity: Polarity; location: SourceLocation }
    | { kind: 'drill'; diameter: number; position: Point; location: SourceLocation };

export type PolygonRole = 'artwork' | 'drill';

/**
 * Closed ring in millimetres: the first point is repeated as the last one.
 */
export interface Polygon {
    ring: Point[];
    winding: Winding;
    polarity: Polarity;
    role: PolygonRole;
    origin: SourceLocation;
    // Set for drill hits, which are planned from the circle rather than the ring.
    circle?: { center: Point; diameter: number };
}

export type ContourClass = 'outer' | 'inner';

export interface ContourNode {
    id: number;
    polygon: Polygon;
    parent: number | null;
    children: number[];
    depth: number;
    materialInside: boolean;
    cuttable: boolean;
    classification: ContourClass;
}

export interface ContourForest {
    nodes: ContourNode[];
    roots: number[];
    notices: string[];
}
