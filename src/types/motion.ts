import type { Point } from './geometry';
import type { Length } from './units';

export type ArcDirection = 'cw' | 'ccw';

export type MotionSegment =
    | { kind: 'line'; to: Point }
    | { kind: 'arc'; to: Point; center: Point; direction: ArcDirection };

export interface Toolpath {
    label: string;
    start: Point;
    segments: MotionSegment[];
}

export interface PlannedPass {
    depth: Length;
    toolpaths: Toolpath[];
}

/**
 * Values are already in the machine's unit system: lengths in mm or inches,
 * feeds per minute.
 */
export type Instruction =
    | { op: 'comment'; text: string }
    | { op: 'units'; system: 'metric' | 'imperial' }
    | { op: 'absolute' }
    | { op: 'tool_init'; tool: string; gcode: string }
    | { op: 'tool_shutdown'; tool: string; gcode: string }
    | { op: 'rapid'; x?: number; y?: number; z?: number; feed: number }
    | { op: 'linear'; x?: number; y?: number; z?: number; feed: number }
    | { op: 'arc'; direction: ArcDirection; x: number; y: number; i: number; j: number; feed: number }
    | { op: 'spindle_on'; direction: ArcDirection; rpm: number }
    | { op: 'spindle_off' }
    | { op: 'laser_on'; level: number }
    | { op: 'laser_off' }
    | { op: 'end' };
