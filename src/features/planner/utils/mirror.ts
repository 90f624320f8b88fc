import type { Point } from '~types/geometry';
import type { MotionSegment, PlannedPass, Toolpath } from '~types/motion';

const reflect = (point: Point, axisX: number): Point => ({ x: 2 * axisX - point.x, y: point.y });

const mirrorSegment = (segment: MotionSegment, axisX: number): MotionSegment =>
    segment.kind === 'line'
        ? { kind: 'line', to: reflect(segment.to, axisX) }
        : {
            kind: 'arc',
            to: reflect(segment.to, axisX),
            center: reflect(segment.center, axisX),
            direction: segment.direction === 'cw' ? 'ccw' : 'cw',
        };

export const mirrorToolpath = (toolpath: Toolpath, axisX: number): Toolpath => ({
    label: toolpath.label,
    start: reflect(toolpath.start, axisX),
    segments: toolpath.segments.map((segment) => mirrorSegment(segment, axisX)),
});

/**
 * Reflects passes across the vertical line x = axisX for work on the back of
 * the board. Arcs change direction.
 */
export const mirrorPasses = (passes: PlannedPass[], axisX: number): PlannedPass[] =>
    passes.map((pass) => ({
        depth: pass.depth,
        toolpaths: pass.toolpaths.map((toolpath) => mirrorToolpath(toolpath, axisX)),
    }));
