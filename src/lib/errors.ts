import type { SourceLocation } from '~types/geometry';

/**
 * Base class for every failure the engine reports about its input.
 */
export class ForgeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class ParseError extends ForgeError {
    readonly source: string;
    readonly line: number;
    readonly column: number;
    readonly command: string;

    constructor(location: SourceLocation, command: string, reason: string) {
        super(`${location.source}:${location.line}:${location.column}: ${reason}${command ? ` (in '${command}')` : ''}`);
        this.source = location.source;
        this.line = location.line;
        this.column = location.column;
        this.command = command;
    }
}

export class GeometryError extends ForgeError {
    readonly contour: string;
    readonly reason: string;

    constructor(contour: string, reason: string) {
        super(`Contour ${contour}: ${reason}`);
        this.contour = contour;
        this.reason = reason;
    }
}

export class PlanningError extends ForgeError {
    readonly stage: string;
    readonly reason: string;

    constructor(stage: string, reason: string) {
        super(`Stage '${stage}': ${reason}`);
        this.stage = stage;
        this.reason = reason;
    }
}

export class BoundsError extends ForgeError {
    readonly stage: string;
    readonly coordinate: { x: number; y: number };

    constructor(stage: string, coordinate: { x: number; y: number }, limits: { width: number; height: number }) {
        super(
            `Stage '${stage}': position X${coordinate.x.toFixed(3)} Y${coordinate.y.toFixed(3)} mm lies outside the ` +
            `${limits.width.toFixed(3)} x ${limits.height.toFixed(3)} mm workspace`
        );
        this.stage = stage;
        this.coordinate = coordinate;
    }
}

export class ConfigError extends ForgeError {
    readonly path: string;

    constructor(path: string, message: string) {
        super(path ? `${path}: ${message}` : message);
        this.path = path;
    }
}

export const describeLocation = (location: SourceLocation): string =>
    `${location.source}:${location.line}:${location.column}`;

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));
