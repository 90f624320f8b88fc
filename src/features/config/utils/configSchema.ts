import { z } from 'zod';
import type { CuttingConfig, EngravingConfig, SpindleBit, Tool, ToolPower } from '~types/machine';
import type { AngularSpeed, Power } from '~types/units';
import { ConfigError } from '@/lib/errors';
import { parseAngularSpeed, parseLength, parsePower, parseSpeed } from './quantity';

/**
 * String field converted with one of the quantity parsers; parse failures
 * become schema issues at the field's path.
 */
const quantity = <T>(parse: (text: string) => T) =>
    z.string().transform((text, ctx) => {
        try {
            return parse(text);
        } catch (err) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: err instanceof Error ? err.message : String(err) });
            return z.NEVER;
        }
    });

const lengthField = quantity((text) => parseLength(text));
const speedField = quantity((text) => parseSpeed(text));
const powerField = quantity((text) => parsePower(text));
const angularSpeedField = quantity((text) => parseAngularSpeed(text));

const bitSchema = z.union([
    z.object({ end_mill: z.object({ diameter: lengthField }).strict() }).strict(),
    z.object({ drill: z.object({ diameter: lengthField }).strict() }).strict(),
]).transform((bit): SpindleBit =>
    'end_mill' in bit
        ? { kind: 'end_mill', diameter: bit.end_mill.diameter }
        : { kind: 'drill', diameter: bit.drill.diameter }
);

const laserSchema = z.object({
    point_diameter: lengthField,
    max_power: powerField,
    pwm_max: z.number().int().positive().optional(),
    init_gcode: z.string().optional(),
    shutdown_gcode: z.string().optional(),
}).strict();

const spindleSchema = z.object({
    max_speed: angularSpeedField,
    bits: z.record(bitSchema),
    init_gcode: z.string().optional(),
    shutdown_gcode: z.string().optional(),
}).strict();

const toolSchema = z.union([
    z.object({ laser: laserSchema }).strict(),
    z.object({ spindle: spindleSchema }).strict(),
]).transform((tool): Tool => {
    if ('laser' in tool) {
        const { point_diameter, max_power, pwm_max, init_gcode, shutdown_gcode } = tool.laser;
        return {
            kind: 'laser',
            pointDiameter: point_diameter,
            maxPower: max_power,
            pwmMax: pwm_max,
            initGcode: init_gcode,
            shutdownGcode: shutdown_gcode,
        };
    }
    const { max_speed, bits, init_gcode, shutdown_gcode } = tool.spindle;
    return { kind: 'spindle', maxSpeed: max_speed, bits, initGcode: init_gcode, shutdownGcode: shutdown_gcode };
});

const powerFields = {
    laser_power: powerField.optional(),
    spindle_speed: angularSpeedField.optional(),
};

interface PowerFields {
    laser_power?: Power;
    spindle_speed?: AngularSpeed;
}

const toolPower = (fields: PowerFields, ctx: z.RefinementCtx): ToolPower => {
    if (fields.laser_power && !fields.spindle_speed) {
        return { kind: 'laser', laserPower: fields.laser_power };
    }
    if (fields.spindle_speed && !fields.laser_power) {
        return { kind: 'spindle', spindleSpeed: fields.spindle_speed };
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'set exactly one of laser_power or spindle_speed' });
    return z.NEVER;
};

const engravingSchema = z.object({
    tool: z.string().min(1),
    work_speed: speedField,
    ...powerFields,
    passes: z.number().int().positive().default(1),
    fill: z.boolean().default(false),
    line_spacing: lengthField.optional(),
    engrave_depth: lengthField.optional(),
    travel_height: lengthField.optional(),
    plunge_speed: speedField.optional(),
}).strict().transform((config, ctx): EngravingConfig => ({
    tool: config.tool,
    workSpeed: config.work_speed,
    power: toolPower(config, ctx),
    passes: config.passes,
    fill: config.fill,
    lineSpacing: config.line_spacing,
    engraveDepth: config.engrave_depth,
    travelHeight: config.travel_height,
    plungeSpeed: config.plunge_speed,
}));

const cuttingSchema = z.object({
    tool: z.string().min(1),
    work_speed: speedField,
    travel_height: lengthField,
    cut_depth: lengthField,
    pass_depth: lengthField,
    plunge_speed: speedField,
    ...powerFields,
}).strict().transform((config, ctx): CuttingConfig => ({
    tool: config.tool,
    workSpeed: config.work_speed,
    travelHeight: config.travel_height,
    cutDepth: config.cut_depth,
    passDepth: config.pass_depth,
    plungeSpeed: config.plunge_speed,
    power: toolPower(config, ctx),
}));

export const machineSchema = z.object({
    units: z.enum(['metric', 'imperial']).default('metric'),
    jog_speed: speedField.default('50 mm/s'),
    init_gcode: z.string().optional(),
    shutdown_gcode: z.string().optional(),
    tools: z.record(toolSchema),
    engraving_configs: z.record(engravingSchema).default({}),
    cutting_configs: z.record(cuttingSchema).default({}),
    workspace_area: z.object({ width: lengthField, height: lengthField }).strict(),
}).strict();

export const globalConfigSchema = z.object({
    machines: z.record(machineSchema).default({}),
    default_engraver: z.string().optional(),
    default_cutter: z.string().optional(),
}).strict();

const lineSelection = z.enum(['inner', 'outer', 'all']);

const engraveStageSchema = z.object({
    engrave_mask: z.object({
        machine_config: z.string().optional(),
        gerber_file: z.string().min(1),
        backside: z.boolean().default(false),
        invert: z.boolean().default(false),
        select_lines: lineSelection.optional(),
    }).strict(),
}).strict();

const cutStageSchema = z.object({
    cut_board: z.object({
        machine_config: z.string().optional(),
        gerber_file: z.string().min(1).optional(),
        drill_file: z.string().min(1).optional(),
        select_lines: lineSelection.optional(),
        backside: z.boolean().default(false),
    }).strict().refine(
        (stage) => (stage.gerber_file === undefined) !== (stage.drill_file === undefined),
        { message: 'set exactly one of gerber_file or drill_file' }
    ),
}).strict();

export const stageSchema = z.union([engraveStageSchema, cutStageSchema]);

export const forgeFileSchema = z.object({
    project_name: z.string().min(1),
    board_version: z.string().optional(),
    align_backside: z.boolean().default(true),
    machines: z.record(machineSchema).default({}),
    gcode_files: z.record(z.array(stageSchema).min(1)),
}).strict();

export type MachineConfig = z.output<typeof machineSchema>;
export type GlobalConfig = z.output<typeof globalConfigSchema>;
export type ForgeFile = z.output<typeof forgeFileSchema>;
export type StageConfig = z.output<typeof stageSchema>;

/**
 * First issue of a failed parse. For stages matching neither shape, the
 * shape that came closest is reported instead of a bare "Invalid input".
 */
const firstIssue = (error: z.ZodError): z.ZodIssue => {
    const issue = error.issues[0];
    if (issue.code !== z.ZodIssueCode.invalid_union) return issue;
    const closest = [...issue.unionErrors].sort((a, b) => a.issues.length - b.issues.length)[0];
    return closest ? firstIssue(closest) : issue;
};

const unwrap = <I, O>(result: z.SafeParseReturnType<I, O>, what: string): O => {
    if (result.success) return result.data;
    const issue = firstIssue(result.error);
    const path = issue.path.join('.');
    throw new ConfigError(path ? `${what}: ${path}` : what, issue.message);
};

export const parseGlobalConfig = (input: unknown): GlobalConfig => unwrap(globalConfigSchema.safeParse(input), 'config');
export const parseForgeFile = (input: unknown): ForgeFile => unwrap(forgeFileSchema.safeParse(input), 'forge file');
