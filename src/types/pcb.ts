import type { LengthUnit } from './units';
import type { Machine, ProcessConfig } from './machine';
import type { Aperture, ContourForest, Primitive } from './geometry';
import type { Instruction } from './motion';

export type ArtworkKind = 'gerber' | 'drill';

export interface CoordinateFormat {
    integerDigits: number;
    decimalDigits: number;
    // Which zeros the writer left out of each coordinate.
    zeros: 'leading' | 'trailing';
    notation: 'absolute' | 'incremental';
}

export interface ArtworkSource {
    name: string;
    kind: ArtworkKind;
    text: string;
    format?: Partial<CoordinateFormat>;
    units?: LengthUnit;
}

export interface ParsedArtwork {
    source: string;
    primitives: Primitive[];
    // Aperture table; drill tools appear as circles keyed by tool number.
    apertures: Aperture[];
    notices: string[];
}

export type StageOperation = 'cut_board' | 'engrave_mask';
export type LineSelection = 'inner' | 'outer' | 'all';

export interface Stage {
    name: string;
    operation: StageOperation;
    artwork: ArtworkSource[];
    machine: Machine;
    process: ProcessConfig;
    backside: boolean;
    selectLines?: LineSelection;
    invert?: boolean;
}

export interface OutputFileSpec {
    name: string;
    stages: Stage[];
}

export interface ForgeProject {
    name: string;
    alignBackside: boolean;
    files: OutputFileSpec[];
}

export interface StageReport {
    stage: string;
    forest: ContourForest;
    passes: number;
    notices: string[];
}

export type OutputFileResult =
    | { name: string; ok: true; instructions: Instruction[]; gcode: string; stages: StageReport[]; notices: string[] }
    | { name: string; ok: false; error: Error; notices: string[] };
