import type { Machine, ResolvedTool, ToolPower } from '~types/machine';
import { PlanningError } from '@/lib/errors';
import { toRpm, toWatts } from '@/features/units/utils/unitValue';

/**
 * Looks up `laser` or `spindle/<bit>` on a machine.
 */
export const resolveTool = (machine: Machine, path: string, stage: string): ResolvedTool => {
    const [name, bitName, ...rest] = path.split('/');
    const tool = machine.tools[name];
    if (!tool || rest.length > 0) {
        throw new PlanningError(stage, `machine '${machine.name}' has no tool '${path}'`);
    }

    if (tool.kind === 'laser') {
        if (bitName !== undefined) {
            throw new PlanningError(stage, `laser '${name}' has no bits, got '${path}'`);
        }
        return { path, tool, diameter: tool.pointDiameter };
    }

    if (bitName === undefined) {
        throw new PlanningError(stage, `spindle '${name}' needs a bit, e.g. '${name}/<bit>'`);
    }
    const bit = tool.bits[bitName];
    if (!bit) {
        throw new PlanningError(stage, `spindle '${name}' has no bit '${bitName}'`);
    }
    return { path, tool, bit, diameter: bit.diameter };
};

/**
 * Rejects power settings meant for the other tool kind or above the tool's limit.
 */
export const checkToolPower = (resolved: ResolvedTool, power: ToolPower, stage: string): void => {
    const { tool } = resolved;
    if (tool.kind !== power.kind) {
        throw new PlanningError(
            stage,
            `tool '${resolved.path}' is a ${tool.kind} but the process sets ${power.kind === 'laser' ? 'laser power' : 'spindle speed'}`
        );
    }

    if (tool.kind === 'laser' && power.kind === 'laser') {
        const requested = toWatts(power.laserPower);
        const limit = toWatts(tool.maxPower);
        if (requested < 0) throw new PlanningError(stage, 'laser power cannot be negative');
        if (requested > limit + 1e-9) {
            throw new PlanningError(stage, `laser power ${requested} W exceeds the maximum of ${limit} W`);
        }
    } else if (tool.kind === 'spindle' && power.kind === 'spindle') {
        const requested = toRpm(power.spindleSpeed);
        const limit = toRpm(tool.maxSpeed);
        if (requested < 0) throw new PlanningError(stage, 'spindle speed cannot be negative');
        if (requested > limit + 1e-9) {
            throw new PlanningError(stage, `spindle speed ${requested} rpm exceeds the maximum of ${limit} rpm`);
        }
    }
};
