import type { Bounds, ContourForest, ContourNode, Point, Polygon } from '~types/geometry';
import type { LineSelection } from '~types/pcb';
import { GeometryError, describeLocation } from '@/lib/errors';
import { boundsContain, boundsOf, interiorPoint, pointInRing, signedArea } from './polygon';

interface Measured {
    polygon: Polygon;
    area: number;
    bounds: Bounds;
    sample: Point;
}

const sameBounds = (a: Bounds, b: Bounds, tolerance: number = 1e-6): boolean =>
    Math.abs(a.minX - b.minX) <= tolerance &&
    Math.abs(a.minY - b.minY) <= tolerance &&
    Math.abs(a.maxX - b.maxX) <= tolerance &&
    Math.abs(a.maxY - b.maxY) <= tolerance;

const measure = (polygon: Polygon): Measured => {
    const sample = interiorPoint(polygon.ring);
    if (!sample) {
        throw new GeometryError(describeLocation(polygon.origin), 'polygon has no interior');
    }
    return {
        polygon,
        area: Math.abs(signedArea(polygon.ring)),
        bounds: boundsOf(polygon.ring),
        sample,
    };
};

const encloses = (outer: Measured, inner: Measured): boolean =>
    boundsContain(outer.bounds, inner.bounds) && pointInRing(inner.sample, outer.polygon.ring);

const isDuplicate = (a: Measured, b: Measured): boolean =>
    sameBounds(a.bounds, b.bounds) &&
    Math.abs(a.area - b.area) <= 1e-6 * Math.max(1, a.area) &&
    pointInRing(a.sample, b.polygon.ring) &&
    pointInRing(b.sample, a.polygon.ring);

/**
 * Drops repeated copies of a polygon. A copy with the other polarity makes
 * containment ambiguous and is rejected.
 */
const removeDuplicates = (measured: Measured[], notices: string[]): Measured[] => {
    const kept: Measured[] = [];
    for (const candidate of measured) {
        const twin = kept.find((other) => isDuplicate(other, candidate));
        if (!twin) {
            kept.push(candidate);
            continue;
        }
        const here = describeLocation(candidate.polygon.origin);
        if (twin.polygon.polarity !== candidate.polygon.polarity || twin.polygon.role !== candidate.polygon.role) {
            throw new GeometryError(
                here,
                `ambiguous containment: same outline as ${describeLocation(twin.polygon.origin)} with ${candidate.polygon.polarity} polarity`
            );
        }
        notices.push(`${here}: duplicate of ${describeLocation(twin.polygon.origin)} dropped`);
    }
    return kept;
};

const resolveMaterial = (polygon: Polygon, parent: ContourNode | null): boolean => {
    if (polygon.role === 'drill') return false;
    if (polygon.polarity === 'clear') return false;
    return parent ? !parent.materialInside : true;
};

/**
 * Builds the containment forest of a layer's polygons and marks which
 * outlines separate material from empty space.
 */
export const classifyContours = (polygons: Polygon[]): ContourForest => {
    const notices: string[] = [];
    const measured = removeDuplicates(polygons.map(measure), notices);

    // Larger polygons first, so every parent is placed before its children.
    const order = measured
        .map((_, index) => index)
        .sort((a, b) => measured[b].area - measured[a].area || a - b);

    const nodes: ContourNode[] = measured.map((entry, id) => ({
        id,
        polygon: entry.polygon,
        parent: null,
        children: [],
        depth: 0,
        materialInside: false,
        cuttable: false,
        classification: 'inner',
    }));

    const placed: number[] = [];
    for (const index of order) {
        const entry = measured[index];
        let parent: number | null = null;
        for (const candidate of placed) {
            const other = measured[candidate];
            if (other.area <= entry.area || !encloses(other, entry)) continue;
            if (parent === null || other.area < measured[parent].area) {
                parent = candidate;
            }
        }

        const node = nodes[index];
        const parentNode = parent === null ? null : nodes[parent];
        node.parent = parent;
        node.depth = parentNode ? parentNode.depth + 1 : 0;
        node.materialInside = resolveMaterial(entry.polygon, parentNode);
        node.cuttable = entry.polygon.role === 'drill' || node.materialInside !== (parentNode?.materialInside ?? false);
        node.classification = node.materialInside ? 'outer' : 'inner';
        parentNode?.children.push(index);
        placed.push(index);
    }

    for (const node of nodes) {
        node.children.sort((a, b) => a - b);
    }

    return {
        nodes,
        roots: nodes.filter((node) => node.parent === null).map((node) => node.id),
        notices,
    };
};

/**
 * Swaps which side of every outline counts as material.
 */
export const invertClassification = (forest: ContourForest): ContourForest => ({
    ...forest,
    nodes: forest.nodes.map((node) => ({
        ...node,
        children: [...node.children],
        materialInside: !node.materialInside,
        classification: node.classification === 'outer' ? 'inner' : 'outer',
    })),
});

export const selectContours = (forest: ContourForest, selection: LineSelection): ContourNode[] =>
    forest.nodes.filter((node) => {
        if (!node.cuttable) return false;
        switch (selection) {
            case 'outer':
                return node.depth === 0 && node.classification === 'outer';
            case 'inner':
                return node.classification === 'inner';
            case 'all':
                return true;
        }
    });
