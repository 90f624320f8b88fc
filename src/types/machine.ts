import type { AngularSpeed, Length, Power, Speed, UnitSystem } from './units';

export type SpindleBit =
    | { kind: 'end_mill'; diameter: Length }
    | { kind: 'drill'; diameter: Length };

export interface LaserTool {
    kind: 'laser';
    pointDiameter: Length;
    maxPower: Power;
    pwmMax?: number; // S value written at full power, 255 when unset
    initGcode?: string;
    shutdownGcode?: string;
}

export interface SpindleTool {
    kind: 'spindle';
    maxSpeed: AngularSpeed;
    bits: Record<string, SpindleBit>;
    initGcode?: string;
    shutdownGcode?: string;
}

export type Tool = LaserTool | SpindleTool;

export type ToolPower =
    | { kind: 'laser'; laserPower: Power }
    | { kind: 'spindle'; spindleSpeed: AngularSpeed };

export interface EngravingConfig {
    tool: string;
    workSpeed: Speed;
    power: ToolPower;
    passes: number;
    fill?: boolean;
    lineSpacing?: Length;
    // Spindle engraving only.
    engraveDepth?: Length;
    travelHeight?: Length;
    plungeSpeed?: Speed;
}

export interface CuttingConfig {
    tool: string;
    workSpeed: Speed;
    travelHeight: Length;
    cutDepth: Length;
    passDepth: Length;
    plungeSpeed: Speed;
    power: ToolPower;
}

export type ProcessConfig =
    | ({ kind: 'engrave' } & EngravingConfig)
    | ({ kind: 'cut' } & CuttingConfig);

export interface WorkspaceArea {
    width: Length;
    height: Length;
}

export interface Machine {
    name: string;
    units: UnitSystem;
    jogSpeed: Speed;
    tools: Record<string, Tool>;
    engravingConfigs: Record<string, EngravingConfig>;
    cuttingConfigs: Record<string, CuttingConfig>;
    workspaceArea: WorkspaceArea;
    // Written verbatim: init before the first use in an output file, shutdown before it ends.
    initGcode?: string;
    shutdownGcode?: string;
}

/**
 * A tool looked up through a process config's tool path (`laser`, `spindle/<bit>`).
 */
export interface ResolvedTool {
    path: string;
    tool: Tool;
    bit?: SpindleBit;
    diameter: Length;
}
