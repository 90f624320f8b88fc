import type { ContourForest, ContourNode, Point } from '~types/geometry';
import type { Toolpath } from '~types/motion';
import { EPSILON, boundsOf, pointInRing, scanlineCrossings } from '@/features/geometry/utils/polygon';

/**
 * Whether the point lies in material, judged by the innermost outline around it.
 */
export const materialAt = (forest: ContourForest, point: Point): boolean => {
    let level: number[] = forest.roots;
    let inside: ContourNode | null = null;
    for (;;) {
        const next = level.map((id) => forest.nodes[id]).find((node) => pointInRing(point, node.polygon.ring));
        if (!next) break;
        inside = next;
        level = next.children;
    }
    return inside ? inside.materialInside : false;
};

/**
 * Horizontal zig-zag strokes over the parts of the artwork's bounding box
 * that hold no material. Rows alternate direction.
 */
export const rasterFill = (forest: ContourForest, spacing: number): Toolpath[] => {
    if (forest.nodes.length === 0 || !(spacing > 0)) return [];

    const bounds = boundsOf(forest.nodes.flatMap((node) => node.polygon.ring));
    const toolpaths: Toolpath[] = [];
    let row = 0;

    for (let y = bounds.minY + spacing / 2; y < bounds.maxY - EPSILON; y += spacing, row++) {
        const crossings = forest.nodes
            .flatMap((node) => scanlineCrossings(node.polygon.ring, y))
            .filter((x) => x > bounds.minX && x < bounds.maxX);
        const stops = [bounds.minX, ...crossings.sort((a, b) => a - b), bounds.maxX];

        const spans: [number, number][] = [];
        for (let i = 0; i + 1 < stops.length; i++) {
            const [from, to] = [stops[i], stops[i + 1]];
            if (to - from <= EPSILON) continue;
            if (materialAt(forest, { x: (from + to) / 2, y })) continue;
            const last = spans[spans.length - 1];
            if (last && Math.abs(last[1] - from) <= EPSILON) {
                last[1] = to;
            } else {
                spans.push([from, to]);
            }
        }

        const ordered = row % 2 === 0 ? spans : [...spans].reverse();
        for (const [from, to] of ordered) {
            const [startX, endX] = row % 2 === 0 ? [from, to] : [to, from];
            toolpaths.push({
                label: `fill row ${row + 1}`,
                start: { x: startX, y },
                segments: [{ kind: 'line', to: { x: endX, y } }],
            });
        }
    }
    return toolpaths;
};
