import type { Instruction } from '~types/motion';

export interface GcodeWriterSettings {
    // Digits after the decimal point.
    precision?: number;
    lineEnding?: string;
}

/**
 * G-code text encoder for instruction streams.
 */
export class GcodeWriter {
    private readonly precision: number;
    private readonly lineEnding: string;

    constructor(settings: GcodeWriterSettings = {}) {
        this.precision = settings.precision ?? 4;
        this.lineEnding = settings.lineEnding ?? '\n';
    }

    public format(value: number): string {
        const fixed = value.toFixed(this.precision);
        const text = fixed.includes('.') ? fixed.replace(/0+$/, '').replace(/\.$/, '') : fixed;
        return text === '-0' ? '0' : text;
    }

    private words(axes: Partial<Record<'X' | 'Y' | 'Z' | 'I' | 'J' | 'F' | 'S', number>>): string {
        return Object.entries(axes)
            .filter((entry): entry is [string, number] => entry[1] !== undefined)
            .map(([letter, value]) => `${letter}${this.format(value)}`)
            .join(' ');
    }

    public line(instruction: Instruction): string {
        switch (instruction.op) {
            case 'comment':
                return `; ${instruction.text}`;
            case 'units':
                return instruction.system === 'metric' ? 'G21' : 'G20';
            case 'absolute':
                return 'G90';
            case 'tool_init':
            case 'tool_shutdown':
                return instruction.gcode.trim();
            case 'rapid':
                return `G0 ${this.words({ X: instruction.x, Y: instruction.y, Z: instruction.z, F: instruction.feed })}`;
            case 'linear':
                return `G1 ${this.words({ X: instruction.x, Y: instruction.y, Z: instruction.z, F: instruction.feed })}`;
            case 'arc':
                return `${instruction.direction === 'cw' ? 'G2' : 'G3'} ${this.words({
                    X: instruction.x,
                    Y: instruction.y,
                    I: instruction.i,
                    J: instruction.j,
                    F: instruction.feed,
                })}`;
            case 'spindle_on':
                return `${instruction.direction === 'cw' ? 'M3' : 'M4'} ${this.words({ S: instruction.rpm })}`;
            case 'spindle_off':
            case 'laser_off':
                return 'M5';
            case 'laser_on':
                return `M3 ${this.words({ S: instruction.level })}`;
            case 'end':
                return 'M2';
        }
    }

    public generate(instructions: Instruction[]): string {
        const lines = instructions
            .map((instruction) => this.line(instruction))
            .filter((line) => line.length > 0);
        return lines.join(this.lineEnding) + this.lineEnding;
    }
}
