import type { Point, Polarity, Polygon, SourceLocation } from '~types/geometry';
import type { CuttingConfig, EngravingConfig, Machine } from '~types/machine';
import type { ArtworkSource, Stage } from '~types/pcb';
import { angularSpeed, length, power, speed } from '@/features/units/utils/unitValue';
import { closeRing } from '@/features/geometry/utils/polygon';

export const at = (line: number, source: string = 'test.gbr'): SourceLocation => ({ source, line, column: 1 });

// Counter-clockwise square with its lower left corner at (x, y).
export const square = (x: number, y: number, size: number): Point[] => closeRing([
    { x, y },
    { x: x + size, y },
    { x: x + size, y: y + size },
    { x, y: y + size },
]);

export const squarePolygon = (x: number, y: number, size: number, polarity: Polarity = 'dark', line: number = 1): Polygon => ({
    ring: square(x, y, size),
    winding: 'ccw',
    polarity,
    role: 'artwork',
    origin: at(line),
});

const word = (mm: number): string => String(Math.round(mm * 1e6));

/**
 * Gerber layer with one filled square region, 3.6 format in millimetres.
 */
export const squareGerber = (x: number, y: number, size: number): string => [
    '%FSLAX36Y36*%',
    '%MOMM*%',
    'G01*',
    'G36*',
    `X${word(x)}Y${word(y)}D02*`,
    `X${word(x + size)}Y${word(y)}D01*`,
    `X${word(x + size)}Y${word(y + size)}D01*`,
    `X${word(x)}Y${word(y + size)}D01*`,
    `X${word(x)}Y${word(y)}D01*`,
    'G37*',
    'M02*',
    '',
].join('\n');

export const millMachine = (overrides: Partial<Machine> = {}): Machine => ({
    name: 'mill',
    units: 'metric',
    jogSpeed: speed(50),
    tools: {
        spindle: {
            kind: 'spindle',
            maxSpeed: angularSpeed(20000),
            bits: {
                em05: { kind: 'end_mill', diameter: length(0.5) },
                drill08: { kind: 'drill', diameter: length(0.8) },
            },
        },
        laser: { kind: 'laser', pointDiameter: length(0.1), maxPower: power(10) },
    },
    engravingConfigs: {},
    cuttingConfigs: {},
    workspaceArea: { width: length(200), height: length(200) },
    ...overrides,
});

export const cutProcess = (overrides: Partial<CuttingConfig> = {}): CuttingConfig => ({
    tool: 'spindle/em05',
    workSpeed: speed(5),
    travelHeight: length(2),
    cutDepth: length(-2),
    passDepth: length(1),
    plungeSpeed: speed(1),
    power: { kind: 'spindle', spindleSpeed: angularSpeed(10000) },
    ...overrides,
});

export const laserEngraving = (overrides: Partial<EngravingConfig> = {}): EngravingConfig => ({
    tool: 'laser',
    workSpeed: speed(10),
    power: { kind: 'laser', laserPower: power(5) },
    passes: 1,
    ...overrides,
});

export const gerberSource = (text: string, name: string = 'board.gbr'): ArtworkSource => ({ name, kind: 'gerber', text });

export const cutStage = (artwork: ArtworkSource[], overrides: Partial<Stage> & { cut?: Partial<CuttingConfig> } = {}): Stage => {
    const { cut, ...stage } = overrides;
    return {
        name: 'board.nc #1 cut_board',
        operation: 'cut_board',
        artwork,
        machine: millMachine(),
        process: { kind: 'cut', ...cutProcess(cut) },
        backside: false,
        ...stage,
    };
};

export const engraveStage = (
    artwork: ArtworkSource[],
    overrides: Partial<Stage> & { engrave?: Partial<EngravingConfig> } = {}
): Stage => {
    const { engrave, ...stage } = overrides;
    return {
        name: 'mask.nc #1 engrave_mask',
        operation: 'engrave_mask',
        artwork,
        machine: millMachine(),
        process: { kind: 'engrave', ...laserEngraving(engrave) },
        backside: false,
        ...stage,
    };
};
