import { describe, test, expect } from 'vitest';
import type { Aperture, Primitive } from '~types/geometry';
import { buildPolygons } from '@/features/geometry/utils/geometryBuilder';
import { classifyContours, selectContours } from '@/features/geometry/utils/contourClassifier';
import { boundsOf } from '@/features/geometry/utils/polygon';
import { GeometryError } from '@/lib/errors';
import { at, square } from './fixtures';

const circle = (diameter: number, holeDiameter?: number): Aperture =>
    holeDiameter === undefined
        ? { shape: 'circle', diameter, code: 10 }
        : { shape: 'circle', diameter, holeDiameter, code: 10 };

describe('GeometryBuilder', () => {
    test('turns a circular flash into a ring around its position', () => {
        const { polygons } = buildPolygons([
            { kind: 'flash', aperture: circle(1), position: { x: 2, y: 3 }, polarity: 'dark', location: at(4) },
        ]);
        expect(polygons).toHaveLength(1);
        const [pad] = polygons;
        expect(pad.role).toBe('artwork');
        expect(pad.winding).toBe('ccw');
        const bounds = boundsOf(pad.ring);
        expect(bounds.minX).toBeCloseTo(1.5, 9);
        expect(bounds.maxX).toBeCloseTo(2.5, 9);
        expect(bounds.maxY).toBeCloseTo(3.5, 6);
    });

    test('adds a clear hole for apertures with a hole', () => {
        const { polygons } = buildPolygons([
            { kind: 'flash', aperture: circle(1, 0.4), position: { x: 0, y: 0 }, polarity: 'dark', location: at(4) },
        ]);
        expect(polygons.map((polygon) => polygon.polarity)).toEqual(['dark', 'clear']);
        expect(boundsOf(polygons[1].ring).maxX).toBeCloseTo(0.2, 9);
    });

    test('flashes rectangles as four corners', () => {
        const { polygons } = buildPolygons([
            {
                kind: 'flash',
                aperture: { shape: 'rectangle', width: 2, height: 1, code: 11 },
                position: { x: 5, y: 5 },
                polarity: 'dark',
                location: at(2),
            },
        ]);
        expect(polygons[0].ring).toEqual([
            { x: 4, y: 4.5 },
            { x: 6, y: 4.5 },
            { x: 6, y: 5.5 },
            { x: 4, y: 5.5 },
            { x: 4, y: 4.5 },
        ]);
    });

    test('skips flashes of empty apertures with a notice', () => {
        const built = buildPolygons([
            { kind: 'flash', aperture: circle(0), position: { x: 0, y: 0 }, polarity: 'dark', location: at(7) },
        ]);
        expect(built.polygons).toEqual([]);
        expect(built.notices).toEqual(['test.gbr:7:1: flash of empty aperture D10 skipped']);
    });

    test('outlines a closed stroke as a ring with an opening', () => {
        const { polygons } = buildPolygons([
            { kind: 'stroke', aperture: circle(0.2), path: square(0, 0, 10), polarity: 'dark', location: at(3) },
        ]);
        expect(polygons.map((polygon) => polygon.polarity)).toEqual(['dark', 'clear']);
        const outer = boundsOf(polygons[0].ring);
        const inner = boundsOf(polygons[1].ring);
        expect(outer.maxX).toBeCloseTo(10.1, 9);
        expect(inner.maxX).toBeCloseTo(9.9, 9);
        expect(inner.minY).toBeCloseTo(0.1, 9);
    });

    test('buffers an open stroke', () => {
        const { polygons } = buildPolygons([
            { kind: 'stroke', aperture: circle(0.4), path: [{ x: 0, y: 0 }, { x: 3, y: 0 }], polarity: 'dark', location: at(3) },
        ]);
        expect(polygons).toHaveLength(1);
        const bounds = boundsOf(polygons[0].ring);
        expect(bounds.maxX).toBeCloseTo(3.2, 9);
        expect(bounds.maxY).toBeCloseTo(0.2, 9);
    });

    test('joins wide segments that meet end to end into one closed outline', () => {
        const corners = [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }];
        const primitives: Primitive[] = corners.map((from, i): Primitive => ({
            kind: 'stroke',
            aperture: circle(0.1),
            path: [from, corners[(i + 1) % corners.length]],
            polarity: 'dark',
            location: at(i + 2),
        }));
        const { polygons } = buildPolygons(primitives);
        expect(polygons.map((polygon) => polygon.polarity)).toEqual(['dark', 'clear']);
        expect(boundsOf(polygons[0].ring).maxX).toBeCloseTo(10.05, 9);
        expect(boundsOf(polygons[1].ring).maxX).toBeCloseTo(9.95, 9);
        expect(polygons[0].origin).toEqual(at(2));
        expect(selectContours(classifyContours(polygons), 'outer')).toHaveLength(1);
    });

    test('buffers connected open segments as one path', () => {
        const { polygons } = buildPolygons([
            { kind: 'stroke', aperture: circle(0.4), path: [{ x: 0, y: 0 }, { x: 3, y: 0 }], polarity: 'dark', location: at(3) },
            { kind: 'stroke', aperture: circle(0.4), path: [{ x: 3, y: 0 }, { x: 3, y: 2 }], polarity: 'dark', location: at(4) },
        ]);
        expect(polygons).toHaveLength(1);
        const bounds = boundsOf(polygons[0].ring);
        expect(bounds.maxX).toBeCloseTo(3.2, 6);
        expect(bounds.maxY).toBeCloseTo(2.2, 6);
        expect(bounds.minY).toBeCloseTo(-0.2, 6);
    });

    test('keeps segments of different widths apart', () => {
        const { polygons } = buildPolygons([
            { kind: 'stroke', aperture: circle(0.4), path: [{ x: 0, y: 0 }, { x: 3, y: 0 }], polarity: 'dark', location: at(3) },
            { kind: 'stroke', aperture: circle(0.2), path: [{ x: 3, y: 0 }, { x: 3, y: 2 }], polarity: 'dark', location: at(4) },
        ]);
        expect(polygons).toHaveLength(2);
    });

    test('merges the parts of a macro flash and cuts clear parts out', () => {
        const { polygons } = buildPolygons([
            {
                kind: 'flash',
                aperture: {
                    shape: 'macro',
                    name: 'FRAME',
                    code: 12,
                    parts: [
                        { polarity: 'dark', ring: square(-1, -1, 2) },
                        { polarity: 'dark', ring: square(0, -1, 2) },
                        { polarity: 'clear', ring: square(-0.5, -0.5, 1) },
                    ],
                },
                position: { x: 10, y: 0 },
                polarity: 'dark',
                location: at(8),
            },
        ]);
        expect(polygons.map((polygon) => polygon.polarity)).toEqual(['dark', 'clear']);
        const outer = boundsOf(polygons[0].ring);
        expect(outer.minX).toBeCloseTo(9, 9);
        expect(outer.maxX).toBeCloseTo(12, 9);
        expect(outer.maxY).toBeCloseTo(1, 9);
        const hole = boundsOf(polygons[1].ring);
        expect(hole.minX).toBeCloseTo(9.5, 9);
        expect(hole.maxX).toBeCloseTo(10.5, 9);
    });

    test('skips a macro whose parts erase each other', () => {
        const built = buildPolygons([
            {
                kind: 'flash',
                aperture: {
                    shape: 'macro',
                    name: 'VOID',
                    code: 13,
                    parts: [
                        { polarity: 'dark', ring: square(0, 0, 1) },
                        { polarity: 'clear', ring: square(-1, -1, 3) },
                    ],
                },
                position: { x: 0, y: 0 },
                polarity: 'dark',
                location: at(9),
            },
        ]);
        expect(built.polygons).toEqual([]);
        expect(built.notices).toEqual(['test.gbr:9:1: aperture macro draws nothing, flash skipped']);
    });

    test('rotates and scales aperture images about the flash point', () => {
        const rectangle: Aperture = { shape: 'rectangle', width: 2, height: 1, code: 11 };
        const { polygons } = buildPolygons([
            {
                kind: 'flash',
                aperture: rectangle,
                position: { x: 5, y: 5 },
                polarity: 'dark',
                location: at(2),
                transform: { mirrorX: false, mirrorY: false, rotation: 90, scale: 1 },
            },
            {
                kind: 'flash',
                aperture: rectangle,
                position: { x: 20, y: 5 },
                polarity: 'dark',
                location: at(3),
                transform: { mirrorX: true, mirrorY: false, rotation: 0, scale: 2 },
            },
        ]);
        const rotated = boundsOf(polygons[0].ring);
        expect(rotated.minX).toBeCloseTo(4.5, 9);
        expect(rotated.maxX).toBeCloseTo(5.5, 9);
        expect(rotated.minY).toBeCloseTo(4, 9);
        expect(rotated.maxY).toBeCloseTo(6, 9);
        expect(boundsOf(polygons[1].ring)).toEqual({ minX: 18, minY: 4, maxX: 22, maxY: 6 });
        expect(polygons[1].winding).toBe('cw');
    });

    test('scales the width of strokes', () => {
        const { polygons } = buildPolygons([
            {
                kind: 'stroke',
                aperture: circle(0.4),
                path: [{ x: 0, y: 0 }, { x: 3, y: 0 }],
                polarity: 'dark',
                location: at(3),
                transform: { mirrorX: false, mirrorY: false, rotation: 0, scale: 0.5 },
            },
        ]);
        expect(boundsOf(polygons[0].ring).maxY).toBeCloseTo(0.1, 9);
    });

    test('keeps regions as drawn', () => {
        const { polygons } = buildPolygons([{ kind: 'region', ring: square(1, 1, 2), polarity: 'clear', location: at(9) }]);
        expect(polygons[0].ring).toEqual(square(1, 1, 2));
        expect(polygons[0].polarity).toBe('clear');
    });

    test('rejects a region whose boundary crosses itself', () => {
        const bowTie = [{ x: 0, y: 0 }, { x: 2, y: 2 }, { x: 2, y: 0 }, { x: 0, y: 2 }, { x: 0, y: 0 }];
        expect(() => buildPolygons([{ kind: 'region', ring: bowTie, polarity: 'dark', location: at(5) }])).toThrow(GeometryError);
    });

    test('chains zero-width strokes into outlines', () => {
        const zero = circle(0);
        const primitives: Primitive[] = [
            { kind: 'stroke', aperture: zero, path: [{ x: 0, y: 0 }, { x: 4, y: 0 }, { x: 4, y: 4 }], polarity: 'dark', location: at(2) },
            { kind: 'stroke', aperture: zero, path: [{ x: 0, y: 0 }, { x: 0, y: 4 }, { x: 4, y: 4 }], polarity: 'dark', location: at(3) },
        ];
        const { polygons } = buildPolygons(primitives);
        expect(polygons).toHaveLength(1);
        expect(boundsOf(polygons[0].ring)).toEqual({ minX: 0, minY: 0, maxX: 4, maxY: 4 });
    });

    test('rejects a zero-width outline that stays open', () => {
        expect(() => buildPolygons([
            { kind: 'stroke', aperture: circle(0), path: [{ x: 0, y: 0 }, { x: 4, y: 0 }], polarity: 'dark', location: at(2) },
        ])).toThrow('zero-width outline starting at (0.0000, 0.0000) mm is not closed');
    });

    test('keeps the drawn circle of drill hits', () => {
        const { polygons } = buildPolygons([{ kind: 'drill', diameter: 0.8, position: { x: 10, y: 10 }, location: at(6, 'holes.drl') }]);
        expect(polygons[0].role).toBe('drill');
        expect(polygons[0].circle).toEqual({ center: { x: 10, y: 10 }, diameter: 0.8 });
    });
});
