import type { Point } from '~types/geometry';
import type { Machine } from '~types/machine';
import type { Instruction, MotionSegment, PlannedPass, Toolpath } from '~types/motion';
import type { Stage } from '~types/pcb';
import type { Speed, UnitSystem } from '~types/units';
import { BoundsError } from '@/lib/errors';
import {
    LENGTH_FACTORS,
    machineUnits,
    toMillimeters,
    toMillimetersPerSecond,
    toRpm,
    toWatts,
} from '@/features/units/utils/unitValue';
import type { StagePlan } from '@/features/planner/utils/pathPlanner';

const DEFAULT_PWM_MAX = 255;
const BOUNDS_TOLERANCE_MM = 1e-6;

/**
 * What has already been written to one output file.
 */
export interface OutputState {
    units: UnitSystem | null;
    // Machines and tools already used, keyed by machine name and `machine/tool`.
    initialized: Set<string>;
    // Shutdown code of everything used so far, in order of first use.
    shutdowns: Extract<Instruction, { op: 'tool_shutdown' }>[];
}

export const createOutputState = (): OutputState => ({ units: null, initialized: new Set(), shutdowns: [] });

/**
 * Shutdown code owed at the end of an output file: tools before the machine
 * they run on, the latest used first.
 */
export const closeOutput = (state: OutputState): Instruction[] => [...state.shutdowns].reverse();

/**
 * Points an arc passes through that bound it: both ends and every axis
 * extreme inside its sweep.
 */
const arcExtremes = (from: Point, segment: Extract<MotionSegment, { kind: 'arc' }>): Point[] => {
    const { center, to, direction } = segment;
    const radius = Math.hypot(from.x - center.x, from.y - center.y);
    const start = Math.atan2(from.y - center.y, from.x - center.x);
    const end = Math.atan2(to.y - center.y, to.x - center.x);
    const points = [to];

    // Walk counter-clockwise from the lower angle to the higher one.
    const low = direction === 'ccw' ? start : end;
    let high = direction === 'ccw' ? end : start;
    if (high <= low + 1e-12) high += 2 * Math.PI;
    const quarter = Math.PI / 2;
    for (let k = Math.ceil(low / quarter); k * quarter <= high; k++) {
        points.push({ x: center.x + radius * Math.cos(k * quarter), y: center.y + radius * Math.sin(k * quarter) });
    }
    return points;
};

const toolpathPoints = (toolpath: Toolpath): Point[] => {
    const points: Point[] = [toolpath.start];
    let current = toolpath.start;
    for (const segment of toolpath.segments) {
        if (segment.kind === 'arc') {
            points.push(...arcExtremes(current, segment));
        } else {
            points.push(segment.to);
        }
        current = segment.to;
    }
    return points;
};

/**
 * Rejects a plan that leaves the machine's travel.
 */
export const checkWorkspace = (passes: PlannedPass[], machine: Machine, stage: string): void => {
    const width = toMillimeters(machine.workspaceArea.width);
    const height = toMillimeters(machine.workspaceArea.height);
    for (const pass of passes) {
        for (const toolpath of pass.toolpaths) {
            for (const point of toolpathPoints(toolpath)) {
                if (
                    point.x < -BOUNDS_TOLERANCE_MM || point.x > width + BOUNDS_TOLERANCE_MM ||
                    point.y < -BOUNDS_TOLERANCE_MM || point.y > height + BOUNDS_TOLERANCE_MM
                ) {
                    throw new BoundsError(stage, point, { width, height });
                }
            }
        }
    }
};

/**
 * Turns planned passes into instructions in the machine's units. One emitter
 * serves one output file, so tool set-up is written once per file.
 */
export class MotionEmitter {
    private readonly scale: number;
    private readonly out: Instruction[] = [];

    constructor(private readonly machine: Machine, private readonly state: OutputState) {
        this.scale = LENGTH_FACTORS[machineUnits(machine.units).length];
    }

    emit(stage: Stage, plan: StagePlan, passes: PlannedPass[] = plan.passes): Instruction[] {
        checkWorkspace(passes, this.machine, stage.name);
        this.out.length = 0;

        this.out.push({ op: 'comment', text: `${stage.name}: ${stage.operation} with ${plan.tool.path}` });
        if (passes.length === 0) {
            return [...this.out];
        }

        this.prelude(plan);
        if (plan.tool.tool.kind === 'laser') {
            this.laser(stage, plan, passes);
        } else {
            this.spindle(stage, plan, passes);
        }
        return [...this.out];
    }

    private prelude(plan: StagePlan): void {
        const { machine, state } = this;
        if (state.units !== machine.units) {
            this.out.push({ op: 'units', system: machine.units }, { op: 'absolute' });
            state.units = machine.units;
        }
        this.firstUse(machine.name, machine.name, machine);
        this.firstUse(`${machine.name}/${plan.tool.path.split('/')[0]}`, plan.tool.path, plan.tool.tool);
    }

    private firstUse(key: string, name: string, code: { initGcode?: string; shutdownGcode?: string }): void {
        const { state } = this;
        if (state.initialized.has(key)) return;
        state.initialized.add(key);
        if (code.initGcode) {
            this.out.push({ op: 'tool_init', tool: name, gcode: code.initGcode });
        }
        if (code.shutdownGcode) {
            state.shutdowns.push({ op: 'tool_shutdown', tool: name, gcode: code.shutdownGcode });
        }
    }

    private length(mm: number): number {
        return mm / this.scale;
    }

    private feed(speed: Speed): number {
        return (toMillimetersPerSecond(speed) * 60) / this.scale;
    }

    private position(point: Point): { x: number; y: number } {
        return { x: this.length(point.x), y: this.length(point.y) };
    }

    private trace(toolpath: Toolpath, feed: number): void {
        let current = toolpath.start;
        for (const segment of toolpath.segments) {
            if (segment.kind === 'line') {
                this.out.push({ op: 'linear', ...this.position(segment.to), feed });
            } else {
                this.out.push({
                    op: 'arc',
                    direction: segment.direction,
                    ...this.position(segment.to),
                    i: this.length(segment.center.x - current.x),
                    j: this.length(segment.center.y - current.y),
                    feed,
                });
            }
            current = segment.to;
        }
    }

    private laser(stage: Stage, plan: StagePlan, passes: PlannedPass[]): void {
        const { process } = stage;
        const tool = plan.tool.tool;
        if (tool.kind !== 'laser' || process.power.kind !== 'laser') return;

        const maxPower = toWatts(tool.maxPower);
        const pwmMax = tool.pwmMax ?? DEFAULT_PWM_MAX;
        const level = maxPower > 0 ? Math.round((toWatts(process.power.laserPower) / maxPower) * pwmMax) : 0;
        const jog = this.feed(this.machine.jogSpeed);
        const work = this.feed(process.workSpeed);

        passes.forEach((pass, index) => {
            this.out.push({ op: 'comment', text: `pass ${index + 1} of ${passes.length}` });
            for (const toolpath of pass.toolpaths) {
                this.out.push({ op: 'rapid', ...this.position(toolpath.start), feed: jog });
                if (level > 0) this.out.push({ op: 'laser_on', level });
                this.trace(toolpath, work);
                if (level > 0) this.out.push({ op: 'laser_off' });
            }
        });
    }

    private spindle(stage: Stage, plan: StagePlan, passes: PlannedPass[]): void {
        const { process } = stage;
        if (process.power.kind !== 'spindle') return;

        const rpm = toRpm(process.power.spindleSpeed);
        const travelHeight = process.travelHeight ? this.length(toMillimeters(process.travelHeight)) : 0;
        const plungeSpeed = process.plungeSpeed ?? process.workSpeed;
        const jog = this.feed(this.machine.jogSpeed);
        const work = this.feed(process.workSpeed);
        const plunge = this.feed(plungeSpeed);
        let spinning = false;

        this.out.push({ op: 'rapid', z: travelHeight, feed: jog });
        passes.forEach((pass, index) => {
            const depth = this.length(toMillimeters(pass.depth));
            this.out.push({ op: 'comment', text: `pass ${index + 1} of ${passes.length} at depth ${toMillimeters(pass.depth)} mm` });
            for (const toolpath of pass.toolpaths) {
                this.out.push({ op: 'rapid', ...this.position(toolpath.start), feed: jog });
                if (!spinning && rpm > 0) {
                    this.out.push({ op: 'spindle_on', direction: 'cw', rpm });
                    spinning = true;
                }
                this.out.push({ op: 'linear', z: depth, feed: plunge });
                this.trace(toolpath, work);
                this.out.push({ op: 'rapid', z: travelHeight, feed: jog });
            }
        });
        if (spinning) {
            this.out.push({ op: 'spindle_off' });
        }
    }
}
