import { describe, test, expect } from 'vitest';
import type { Instruction, PlannedPass } from '~types/motion';
import type { Stage } from '~types/pcb';
import { GcodeWriter } from '@/features/gcode/utils/gcodeWriter';
import { MotionEmitter, checkWorkspace, closeOutput, createOutputState } from '@/features/gcode/utils/motionEmitter';
import type { StagePlan } from '@/features/planner/utils/pathPlanner';
import { resolveTool } from '@/features/planner/utils/toolResolver';
import { angularSpeed, length } from '@/features/units/utils/unitValue';
import { BoundsError } from '@/lib/errors';
import { cutStage, engraveStage, millMachine } from './fixtures';

const line = (from: { x: number; y: number }, to: { x: number; y: number }): PlannedPass['toolpaths'][number] => ({
    label: 'line',
    start: from,
    segments: [{ kind: 'line', to }],
});

const planFor = (stage: Stage, passes: PlannedPass[]): StagePlan => ({
    stage: stage.name,
    tool: resolveTool(stage.machine, stage.process.tool, stage.name),
    forest: { nodes: [], roots: [], notices: [] },
    passes,
    notices: [],
});

const ops = (instructions: Instruction[]) => instructions.map((instruction) => instruction.op);

describe('GcodeWriter', () => {
    const writer = new GcodeWriter();

    test('formats numbers without trailing zeros', () => {
        expect(writer.format(2)).toBe('2');
        expect(writer.format(100)).toBe('100');
        expect(writer.format(1.5)).toBe('1.5');
        expect(writer.format(0.123456)).toBe('0.1235');
        expect(writer.format(-0.00001)).toBe('0');
    });

    test('writes each instruction on its own line', () => {
        const text = writer.generate([
            { op: 'comment', text: 'hello' },
            { op: 'units', system: 'metric' },
            { op: 'absolute' },
            { op: 'tool_init', tool: 'laser', gcode: '  M8\n' },
            { op: 'rapid', z: 2, feed: 3000 },
            { op: 'rapid', x: 1, y: 2.5, feed: 3000 },
            { op: 'spindle_on', direction: 'cw', rpm: 10000 },
            { op: 'linear', z: -0.5, feed: 60 },
            { op: 'arc', direction: 'ccw', x: 1, y: 2, i: -0.5, j: 0, feed: 300 },
            { op: 'arc', direction: 'cw', x: 0, y: 0, i: 0.25, j: 0.25, feed: 300 },
            { op: 'spindle_off' },
            { op: 'laser_on', level: 128 },
            { op: 'laser_off' },
            { op: 'units', system: 'imperial' },
            { op: 'tool_shutdown', tool: 'laser', gcode: 'M9\n' },
            { op: 'end' },
        ]);
        expect(text).toBe([
            '; hello',
            'G21',
            'G90',
            'M8',
            'G0 Z2 F3000',
            'G0 X1 Y2.5 F3000',
            'M3 S10000',
            'G1 Z-0.5 F60',
            'G3 X1 Y2 I-0.5 J0 F300',
            'G2 X0 Y0 I0.25 J0.25 F300',
            'M5',
            'M3 S128',
            'M5',
            'G20',
            'M9',
            'M2',
            '',
        ].join('\n'));
    });

    test('honours precision and line endings', () => {
        const custom = new GcodeWriter({ precision: 2, lineEnding: '\r\n' });
        expect(custom.generate([{ op: 'linear', x: 1.23456, feed: 60 }, { op: 'end' }])).toBe('G1 X1.23 F60\r\nM2\r\n');
    });
});

describe('MotionEmitter', () => {
    test('plunges and retracts around every toolpath of a spindle pass', () => {
        const stage = cutStage([]);
        const passes: PlannedPass[] = [
            { depth: length(-1), toolpaths: [line({ x: 1, y: 1 }, { x: 5, y: 1 })] },
            { depth: length(-2), toolpaths: [line({ x: 1, y: 1 }, { x: 5, y: 1 })] },
        ];
        const out = new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, passes));
        expect(out).toEqual([
            { op: 'comment', text: 'board.nc #1 cut_board: cut_board with spindle/em05' },
            { op: 'units', system: 'metric' },
            { op: 'absolute' },
            { op: 'rapid', z: 2, feed: 3000 },
            { op: 'comment', text: 'pass 1 of 2 at depth -1 mm' },
            { op: 'rapid', x: 1, y: 1, feed: 3000 },
            { op: 'spindle_on', direction: 'cw', rpm: 10000 },
            { op: 'linear', z: -1, feed: 60 },
            { op: 'linear', x: 5, y: 1, feed: 300 },
            { op: 'rapid', z: 2, feed: 3000 },
            { op: 'comment', text: 'pass 2 of 2 at depth -2 mm' },
            { op: 'rapid', x: 1, y: 1, feed: 3000 },
            { op: 'linear', z: -2, feed: 60 },
            { op: 'linear', x: 5, y: 1, feed: 300 },
            { op: 'rapid', z: 2, feed: 3000 },
            { op: 'spindle_off' },
        ]);
    });

    test('leaves the spindle alone at zero speed', () => {
        const stage = cutStage([], { cut: { power: { kind: 'spindle', spindleSpeed: angularSpeed(0) } } });
        const passes: PlannedPass[] = [{ depth: length(-1), toolpaths: [line({ x: 1, y: 1 }, { x: 2, y: 1 })] }];
        const out = new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, passes));
        expect(ops(out)).not.toContain('spindle_on');
        expect(ops(out)).not.toContain('spindle_off');
    });

    test('switches the laser per toolpath at the scaled power level', () => {
        const stage = engraveStage([]);
        const passes: PlannedPass[] = [{
            depth: length(0),
            toolpaths: [line({ x: 1, y: 1 }, { x: 2, y: 1 }), line({ x: 3, y: 3 }, { x: 4, y: 3 })],
        }];
        const out = new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, passes));
        expect(out.slice(3)).toEqual([
            { op: 'comment', text: 'pass 1 of 1' },
            { op: 'rapid', x: 1, y: 1, feed: 3000 },
            { op: 'laser_on', level: 128 },
            { op: 'linear', x: 2, y: 1, feed: 600 },
            { op: 'laser_off' },
            { op: 'rapid', x: 3, y: 3, feed: 3000 },
            { op: 'laser_on', level: 128 },
            { op: 'linear', x: 4, y: 3, feed: 600 },
            { op: 'laser_off' },
        ]);
    });

    test('writes arcs with centre offsets from the arc start', () => {
        const stage = engraveStage([]);
        const passes: PlannedPass[] = [{
            depth: length(0),
            toolpaths: [{
                label: 'hole',
                start: { x: 10.4, y: 10 },
                segments: [{ kind: 'arc', to: { x: 9.6, y: 10 }, center: { x: 10, y: 10 }, direction: 'ccw' }],
            }],
        }];
        const out = new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, passes));
        const arc = out.find((instruction) => instruction.op === 'arc');
        expect(arc).toMatchObject({ op: 'arc', direction: 'ccw', x: 9.6, y: 10, j: 0 });
        expect(arc?.op === 'arc' && arc.i).toBeCloseTo(-0.4, 9);
    });

    test('converts to inches on imperial machines', () => {
        const stage = engraveStage([], { machine: millMachine({ units: 'imperial' }) });
        const passes: PlannedPass[] = [{ depth: length(0), toolpaths: [line({ x: 25.4, y: 50.8 }, { x: 0, y: 0 })] }];
        const text = new GcodeWriter().generate(
            new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, passes))
        );
        expect(text.split('\n').slice(1, 5)).toEqual(['G20', 'G90', '; pass 1 of 1', 'G0 X1 Y2 F118.1102']);
    });

    test('writes units and tool set-up once per output file', () => {
        const machine = millMachine({ initGcode: 'G28' });
        const spindle = machine.tools.spindle;
        if (spindle.kind === 'spindle') spindle.initGcode = 'M8';
        const stage = cutStage([], { machine });
        const passes: PlannedPass[] = [{ depth: length(-1), toolpaths: [line({ x: 1, y: 1 }, { x: 2, y: 1 })] }];
        const state = createOutputState();
        const first = new MotionEmitter(machine, state).emit(stage, planFor(stage, passes));
        const second = new MotionEmitter(machine, state).emit(stage, planFor(stage, passes));
        expect(first.filter((instruction) => instruction.op === 'tool_init')).toEqual([
            { op: 'tool_init', tool: 'mill', gcode: 'G28' },
            { op: 'tool_init', tool: 'spindle/em05', gcode: 'M8' },
        ]);
        expect(ops(second)).not.toContain('tool_init');
        expect(ops(second)).not.toContain('units');
    });

    test('owes shutdown code for what the file used, tools before their machine', () => {
        const machine = millMachine({ shutdownGcode: 'M84' });
        const spindle = machine.tools.spindle;
        if (spindle.kind === 'spindle') spindle.shutdownGcode = 'M9';
        const stage = cutStage([], { machine });
        const passes: PlannedPass[] = [{ depth: length(-1), toolpaths: [line({ x: 1, y: 1 }, { x: 2, y: 1 })] }];
        const state = createOutputState();
        const first = new MotionEmitter(machine, state).emit(stage, planFor(stage, passes));
        new MotionEmitter(machine, state).emit(stage, planFor(stage, passes));

        expect(ops(first)).not.toContain('tool_shutdown');
        expect(closeOutput(state)).toEqual([
            { op: 'tool_shutdown', tool: 'spindle/em05', gcode: 'M9' },
            { op: 'tool_shutdown', tool: 'mill', gcode: 'M84' },
        ]);
        expect(closeOutput(createOutputState())).toEqual([]);
    });

    test('emits only a comment for an empty plan', () => {
        const stage = cutStage([]);
        const out = new MotionEmitter(stage.machine, createOutputState()).emit(stage, planFor(stage, []));
        expect(out).toEqual([{ op: 'comment', text: 'board.nc #1 cut_board: cut_board with spindle/em05' }]);
    });
});

describe('checkWorkspace', () => {
    const machine = millMachine({ workspaceArea: { width: length(100), height: length(50) } });

    test('accepts paths inside the work area', () => {
        expect(() => checkWorkspace([{ depth: length(0), toolpaths: [line({ x: 0, y: 0 }, { x: 100, y: 50 })] }], machine, 's'))
            .not.toThrow();
    });

    test('rejects a point outside the work area', () => {
        const passes: PlannedPass[] = [{ depth: length(0), toolpaths: [line({ x: 1, y: 1 }, { x: 1, y: 60 })] }];
        expect(() => checkWorkspace(passes, machine, 's')).toThrow(BoundsError);
        expect(() => checkWorkspace(passes, machine, 's')).toThrow(
            "Stage 's': position X1.000 Y60.000 mm lies outside the 100.000 x 50.000 mm workspace"
        );
    });

    test('checks how far arcs bulge, not only their end points', () => {
        const passes: PlannedPass[] = [{
            depth: length(0),
            toolpaths: [{
                label: 'bulge',
                start: { x: 0.5, y: 25 },
                segments: [{ kind: 'arc', to: { x: 0.5, y: 27 }, center: { x: 0.5, y: 26 }, direction: 'cw' }],
            }],
        }];
        expect(() => checkWorkspace(passes, machine, 's')).toThrow(BoundsError);
    });
});
