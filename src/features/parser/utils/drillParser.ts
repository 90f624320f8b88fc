import type { Aperture, Point, Primitive, SourceLocation } from '~types/geometry';
import type { ArtworkSource, CoordinateFormat, ParsedArtwork } from '~types/pcb';
import type { LengthUnit } from '~types/units';
import { ParseError } from '@/lib/errors';
import { LENGTH_FACTORS } from '@/features/units/utils/unitValue';
import { decodeCoordinate } from './coordinateFormat';

const DIGITS_BY_UNIT: Record<'mm' | 'in', Pick<CoordinateFormat, 'integerDigits' | 'decimalDigits'>> = {
    mm: { integerDigits: 3, decimalDigits: 3 },
    in: { integerDigits: 2, decimalDigits: 4 },
};

const HIT_PATTERN = /^(?:X([+-]?[\d.]+))?(?:Y([+-]?[\d.]+))?$/;
const TOOL_PATTERN = /^T(\d+)(.*)$/;
const ROUTING_COMMANDS = /^(G00|G01|G02|G03|G85|M15|M16|M17)/;
const IGNORED_HEADER = /^(VER|FMAT|ICI|DETECT|ATC|OM48|BLKD|SBK|SG|TCST|R,|AFS|CP)/;

/**
 * Interpreter state for one drill file. Tool diameters and positions are in millimetres.
 */
export interface DrillState {
    unit: LengthUnit;
    format: CoordinateFormat;
    // Set once the header or the caller names the digit split.
    digitsDeclared: boolean;
    inHeader: boolean;
    tools: Map<number, number>;
    tool: number | null;
    position: Point;
    primitives: Primitive[];
    notices: string[];
    ended: boolean;
}

export const createDrillState = (source: ArtworkSource): DrillState => {
    const unit = source.units ?? 'mm';
    const digits = unit === 'in' ? DIGITS_BY_UNIT.in : DIGITS_BY_UNIT.mm;
    return {
        unit,
        format: { ...digits, zeros: 'leading', notation: 'absolute', ...source.format },
        digitsDeclared: source.format?.decimalDigits !== undefined,
        inHeader: false,
        tools: new Map(),
        tool: null,
        position: { x: 0, y: 0 },
        primitives: [],
        notices: [],
        ended: false,
    };
};

/**
 * Reads an Excellon drill file into drill hits.
 */
export class DrillInterpreter {
    private readonly state: DrillState;

    constructor(private readonly source: ArtworkSource) {
        this.state = createDrillState(source);
    }

    run(): ParsedArtwork {
        const lines = this.source.text.split(/\r?\n/);
        for (let index = 0; index < lines.length && !this.state.ended; index++) {
            const raw = lines[index];
            const text = raw.trim();
            if (text.length === 0) continue;
            const location: SourceLocation = {
                source: this.source.name,
                line: index + 1,
                column: raw.indexOf(text) + 1,
            };
            if (this.state.inHeader) {
                this.header(text, location);
            } else {
                this.body(text, location);
            }
        }

        if (this.state.inHeader) {
            this.state.notices.push(`${this.source.name}: header is never closed with % or M95`);
        }
        if (!this.state.ended) {
            this.state.notices.push(`${this.source.name}: file ends without M30`);
        }

        const apertures: Aperture[] = [...this.state.tools.entries()].map(([code, diameter]) => ({
            shape: 'circle',
            diameter,
            code,
        }));
        return {
            source: this.source.name,
            primitives: this.state.primitives,
            apertures,
            notices: this.state.notices,
        };
    }

    private header(text: string, location: SourceLocation): void {
        const { state } = this;
        if (text === '%' || text === 'M95') {
            state.inHeader = false;
            return;
        }
        if (text.startsWith(';')) {
            // KiCad and others note the digit split in a comment.
            const match = /FILE_FORMAT=(\d):(\d)/.exec(text);
            if (match && !state.digitsDeclared) {
                state.format = { ...state.format, integerDigits: parseInt(match[1], 10), decimalDigits: parseInt(match[2], 10) };
                state.digitsDeclared = true;
            }
            return;
        }
        if (text.startsWith('METRIC') || text.startsWith('INCH')) {
            this.unitLine(text, location);
            return;
        }
        if (text.startsWith('T')) {
            this.toolLine(text, location);
            return;
        }
        if (text === 'G90' || text === 'G91') {
            this.body(text, location);
            return;
        }
        if (IGNORED_HEADER.test(text)) return;
        throw new ParseError(location, text, 'unknown drill header command');
    }

    private unitLine(text: string, location: SourceLocation): void {
        const { state } = this;
        const [units, ...options] = text.split(',');
        if (units !== 'METRIC' && units !== 'INCH') {
            throw new ParseError(location, text, 'unknown unit declaration');
        }
        state.unit = units === 'METRIC' ? 'mm' : 'in';
        if (!state.digitsDeclared) {
            state.format = { ...state.format, ...DIGITS_BY_UNIT[state.unit === 'mm' ? 'mm' : 'in'] };
        }
        for (const option of options) {
            if (option === 'LZ') {
                // Leading zeros kept, so trailing ones were dropped.
                state.format = { ...state.format, zeros: 'trailing' };
            } else if (option === 'TZ') {
                state.format = { ...state.format, zeros: 'leading' };
            } else if (/^0*\.0*$/.test(option)) {
                const [integer, decimal] = option.split('.');
                state.format = { ...state.format, integerDigits: integer.length, decimalDigits: decimal.length };
                state.digitsDeclared = true;
            } else {
                throw new ParseError(location, text, `unknown unit option '${option}'`);
            }
        }
    }

    private toolLine(text: string, location: SourceLocation): void {
        const { state } = this;
        const match = TOOL_PATTERN.exec(text);
        if (!match) throw new ParseError(location, text, 'malformed tool command');
        const code = parseInt(match[1], 10);
        const rest = match[2];

        const diameter = /C([\d.]+)/.exec(rest);
        if (diameter) {
            const value = parseFloat(diameter[1]) * LENGTH_FACTORS[state.unit];
            if (!(value > 0)) throw new ParseError(location, text, 'tool diameter must be positive');
            state.tools.set(code, value);
            return;
        }
        if (state.inHeader) {
            throw new ParseError(location, text, 'tool definition without a diameter');
        }
        if (rest.length > 0) {
            throw new ParseError(location, text, 'malformed tool selection');
        }
        if (code === 0) {
            state.tool = null;
            return;
        }
        if (!state.tools.has(code)) {
            throw new ParseError(location, text, `tool T${code} is not defined`);
        }
        state.tool = code;
    }

    private body(text: string, location: SourceLocation): void {
        const { state } = this;
        if (text.startsWith(';')) return;
        if (text === 'M48') {
            state.inHeader = true;
            return;
        }
        if (text === 'M30' || text === 'M00') {
            state.ended = true;
            return;
        }
        if (text === 'G90') {
            state.format = { ...state.format, notation: 'absolute' };
            return;
        }
        if (text === 'G91') {
            state.format = { ...state.format, notation: 'incremental' };
            return;
        }
        if (text === 'G05' || text === 'G5' || text === '%' || text === 'M95') return;
        if (ROUTING_COMMANDS.test(text)) {
            throw new ParseError(location, text, 'routing commands are not supported');
        }
        if (text.startsWith('T')) {
            this.toolLine(text, location);
            return;
        }
        if (text.startsWith('METRIC') || text.startsWith('INCH')) {
            this.unitLine(text, location);
            return;
        }
        if (text === 'M71') {
            state.unit = 'mm';
            return;
        }
        if (text === 'M72') {
            state.unit = 'in';
            return;
        }

        const hit = HIT_PATTERN.exec(text);
        if (!hit || (hit[1] === undefined && hit[2] === undefined)) {
            throw new ParseError(location, text, 'unknown or malformed drill command');
        }
        if (state.tool === null) {
            throw new ParseError(location, text, 'drill hit before any tool is selected');
        }
        const diameter = state.tools.get(state.tool);
        if (diameter === undefined) {
            throw new ParseError(location, text, `tool T${state.tool} is not defined`);
        }

        const position = {
            x: this.axis(hit[1], state.position.x, text, location),
            y: this.axis(hit[2], state.position.y, text, location),
        };
        state.position = position;
        state.primitives.push({ kind: 'drill', diameter, position, location });
    }

    private axis(value: string | undefined, current: number, text: string, location: SourceLocation): number {
        if (value === undefined) return current;
        let decoded: number;
        try {
            decoded = decodeCoordinate(value, this.state.format) * LENGTH_FACTORS[this.state.unit];
        } catch (err) {
            throw new ParseError(location, text, err instanceof Error ? err.message : String(err));
        }
        return this.state.format.notation === 'incremental' ? current + decoded : decoded;
    }
}

export const parseDrill = (source: ArtworkSource): ParsedArtwork => new DrillInterpreter(source).run();
