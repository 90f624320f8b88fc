import type { ContourForest, ContourNode, Point } from '~types/geometry';
import type { ResolvedTool } from '~types/machine';
import type { MotionSegment, PlannedPass, Toolpath } from '~types/motion';
import type { LineSelection, Stage } from '~types/pcb';
import { GeometryError, PlanningError, describeLocation } from '@/lib/errors';
import { length, toMillimeters } from '@/features/units/utils/unitValue';
import { invertClassification, selectContours } from '@/features/geometry/utils/contourClassifier';
import { offsetRing } from '@/features/geometry/utils/offset';
import { openRing, toCounterClockwise } from '@/features/geometry/utils/polygon';
import { sliceDepths } from './depthSlicer';
import { rasterFill } from './rasterFill';
import { checkToolPower, resolveTool } from './toolResolver';

export interface StagePlan {
    stage: string;
    tool: ResolvedTool;
    forest: ContourForest;
    passes: PlannedPass[];
    notices: string[];
}

const ringToolpath = (ring: Point[], label: string): Toolpath => {
    const points = openRing(ring);
    return {
        label,
        start: points[0],
        segments: [...points.slice(1), points[0]].map((to): MotionSegment => ({ kind: 'line', to })),
    };
};

/**
 * The hit circle as two half-turn arcs, starting on its right-hand side.
 */
const circleToolpath = (center: Point, diameter: number, label: string): Toolpath => {
    const r = diameter / 2;
    const start = { x: center.x + r, y: center.y };
    return {
        label,
        start,
        segments: [
            { kind: 'arc', to: { x: center.x - r, y: center.y }, center, direction: 'ccw' },
            { kind: 'arc', to: start, center, direction: 'ccw' },
        ],
    };
};

export const defaultSelection = (stage: Stage): LineSelection => stage.selectLines ?? 'all';

export class PathPlanner {
    /**
     * Plans every pass of one stage over its classified contours.
     */
    static plan(stage: Stage, forest: ContourForest): StagePlan {
        const { process, machine } = stage;
        const tool = resolveTool(machine, process.tool, stage.name);
        checkToolPower(tool, process.power, stage.name);

        const classified = stage.invert ? invertClassification(forest) : forest;
        const selected = selectContours(classified, defaultSelection(stage));
        const notices: string[] = [];
        const plan = (passes: PlannedPass[]): StagePlan => ({ stage: stage.name, tool, forest: classified, passes, notices });

        if (process.kind === 'cut') {
            const slices = sliceDepths(process.cutDepth, process.passDepth, stage.name);
            notices.push(...slices.notices);
            if (selected.length === 0) {
                notices.push(`Stage '${stage.name}': no contours selected, nothing to cut`);
                return plan([]);
            }
            const toolpaths = selected.map((node) => PathPlanner.cutToolpath(node, tool, stage.name, notices));
            return plan(slices.depths.map((depth) => ({ depth, toolpaths })));
        }

        if (!Number.isInteger(process.passes) || process.passes < 1) {
            throw new PlanningError(stage.name, `engraving needs at least one pass, got ${process.passes}`);
        }

        let depth = 0;
        if (tool.tool.kind === 'spindle') {
            if (!process.engraveDepth || !process.travelHeight) {
                throw new PlanningError(stage.name, 'spindle engraving needs an engrave depth and a travel height');
            }
            depth = toMillimeters(process.engraveDepth);
            if (depth > 0) {
                throw new PlanningError(stage.name, `engrave depth must not be above the surface, got ${depth} mm`);
            }
        }

        const toolpaths = selected.map((node) =>
            node.polygon.circle
                ? circleToolpath(node.polygon.circle.center, node.polygon.circle.diameter, PathPlanner.label(node))
                : ringToolpath(node.polygon.ring, PathPlanner.label(node))
        );
        if (process.fill) {
            const spacing = toMillimeters(process.lineSpacing ?? tool.diameter);
            if (!(spacing > 0)) {
                throw new PlanningError(stage.name, 'raster fill needs a positive line spacing');
            }
            toolpaths.push(...rasterFill(classified, spacing));
        }

        if (toolpaths.length === 0) {
            notices.push(`Stage '${stage.name}': no contours selected, nothing to engrave`);
            return plan([]);
        }
        const passes: PlannedPass[] = [];
        for (let i = 0; i < process.passes; i++) {
            passes.push({ depth: length(depth), toolpaths });
        }
        return plan(passes);
    }

    private static label(node: ContourNode): string {
        return `contour ${node.id} (${describeLocation(node.polygon.origin)})`;
    }

    private static cutToolpath(node: ContourNode, tool: ResolvedTool, stage: string, notices: string[]): Toolpath {
        const label = PathPlanner.label(node);
        const diameter = toMillimeters(tool.diameter);
        const circle = node.polygon.circle;

        // Drill hits keep their drawn size.
        if (circle) {
            if (tool.bit?.kind === 'drill') {
                if (Math.abs(diameter - circle.diameter) > 0.05) {
                    notices.push(`Stage '${stage}': ${circle.diameter} mm hole drilled with a ${diameter} mm bit`);
                }
                return { label, start: { ...circle.center }, segments: [] };
            }
            return circleToolpath(circle.center, circle.diameter, label);
        }

        if (tool.bit?.kind === 'drill') {
            throw new PlanningError(stage, `drill bit '${tool.path}' can only plunge drill hits, not trace ${label}`);
        }

        const ring = toCounterClockwise(node.polygon.ring);
        const distance = node.classification === 'outer' ? diameter / 2 : -diameter / 2;
        try {
            return ringToolpath(offsetRing(ring, distance, { label }), label);
        } catch (err) {
            if (err instanceof GeometryError) {
                throw new PlanningError(stage, `${label}: ${err.reason}`);
            }
            throw err;
        }
    }
}
