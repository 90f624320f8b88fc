import type {
    Aperture,
    ApertureTemplate,
    ApertureTransform,
    Point,
    Polarity,
    Primitive,
    SourceLocation,
} from '~types/geometry';
import type { ArtworkSource, CoordinateFormat, ParsedArtwork } from '~types/pcb';
import type { ArcDirection } from '~types/motion';
import type { LengthUnit } from '~types/units';
import { ParseError } from '@/lib/errors';
import { LENGTH_FACTORS } from '@/features/units/utils/unitValue';
import { linearizeArc } from '@/features/geometry/utils/arcs';
import { samePoint } from '@/features/geometry/utils/polygon';
import { DEFAULT_GERBER_FORMAT, decodeCoordinate } from './coordinateFormat';
import { type MacroDefinition, expandMacro } from './apertureMacro';
import { type GerberStatement, type GerberToken, tokenizeGerber } from './gerberTokenizer';

type Interpolation = 'linear' | ArcDirection;
type Operation = 1 | 2 | 3;

interface OpenStroke {
    aperture: Aperture;
    polarity: Polarity;
    transform?: ApertureTransform;
    path: Point[];
    location: SourceLocation;
}

interface OpenRegion {
    location: SourceLocation;
    contour: Point[] | null;
    contourLocation: SourceLocation;
}

/**
 * Interpreter state for one Gerber file. Positions are held in millimetres.
 */
export interface GerberState {
    format: CoordinateFormat;
    formatDeclared: boolean;
    unit: LengthUnit;
    unitDeclared: boolean;
    position: Point;
    aperture: Aperture | null;
    interpolation: Interpolation;
    polarity: Polarity;
    transform: ApertureTransform;
    region: OpenRegion | null;
    stroke: OpenStroke | null;
    lastOperation: Operation | null;
    apertures: Map<number, Aperture>;
    macros: Map<string, MacroDefinition>;
    primitives: Primitive[];
    notices: string[];
    ended: boolean;
}

export const createGerberState = (source: ArtworkSource): GerberState => ({
    format: { ...DEFAULT_GERBER_FORMAT, ...source.format },
    formatDeclared: source.format !== undefined,
    unit: source.units ?? 'mm',
    unitDeclared: source.units !== undefined,
    position: { x: 0, y: 0 },
    aperture: null,
    interpolation: 'linear',
    polarity: 'dark',
    transform: { mirrorX: false, mirrorY: false, rotation: 0, scale: 1 },
    region: null,
    stroke: null,
    lastOperation: null,
    apertures: new Map(),
    macros: new Map(),
    primitives: [],
    notices: [],
    ended: false,
});

const WORD_PATTERN =
    /^(?:G(\d+))?(?:X([+-]?[\d.]+))?(?:Y([+-]?[\d.]+))?(?:I([+-]?[\d.]+))?(?:J([+-]?[\d.]+))?(?:D(\d+))?$/;

const FORMAT_PATTERN = /^FS([LTD]?)([AI])X(\d)(\d)Y(\d)(\d)$/;
const APERTURE_PATTERN = /^ADD(\d+)([A-Za-z_$.][\w.$-]*?)(?:,(.*))?$/;

const IGNORED_EXTENDED = ['TF', 'TA', 'TO', 'TD', 'IN', 'LN'];

const MIRRORING: Record<string, Pick<ApertureTransform, 'mirrorX' | 'mirrorY'>> = {
    N: { mirrorX: false, mirrorY: false },
    X: { mirrorX: true, mirrorY: false },
    Y: { mirrorX: false, mirrorY: true },
    XY: { mirrorX: true, mirrorY: true },
};

// Undefined when the transform leaves aperture images as they are.
const activeTransform = (transform: ApertureTransform): ApertureTransform | undefined =>
    transform.mirrorX || transform.mirrorY || transform.rotation % 360 !== 0 || transform.scale !== 1
        ? { ...transform }
        : undefined;

/**
 * Interprets a Gerber RS-274X layer into primitives in millimetres.
 */
export class GerberInterpreter {
    private readonly state: GerberState;

    constructor(private readonly source: ArtworkSource) {
        this.state = createGerberState(source);
    }

    run(): ParsedArtwork {
        const tokens = tokenizeGerber(this.source.text, this.source.name);
        for (const token of tokens) {
            if (this.state.ended) break;
            if (token.kind === 'macro') {
                this.defineMacro(token.body.slice(2), token.content, token.location);
            } else if (token.kind === 'extended') {
                this.extended(token);
            } else {
                this.word(token);
            }
        }

        const { state } = this;
        if (state.region) {
            throw new ParseError(
                state.region.location,
                'G36',
                `region started at line ${state.region.location.line} is never closed by G37`
            );
        }
        this.flushStroke();
        if (!state.ended) {
            state.notices.push(`${this.source.name}: file ends without M02`);
        }
        if (!state.unitDeclared) {
            state.notices.push(`${this.source.name}: no unit mode, coordinates read as ${state.unit}`);
        }
        if (!state.formatDeclared) {
            state.notices.push(`${this.source.name}: no %FS command, coordinates read as ${state.format.integerDigits}.${state.format.decimalDigits}`);
        }

        return {
            source: this.source.name,
            primitives: state.primitives,
            apertures: [...state.apertures.values()],
            notices: state.notices,
        };
    }

    private extended(token: GerberToken): void {
        const { body, location } = token;
        const code = body.slice(0, 2);
        const { state } = this;

        if (IGNORED_EXTENDED.includes(code)) return;

        switch (code) {
            case 'FS': {
                const match = FORMAT_PATTERN.exec(body);
                if (!match) throw new ParseError(location, body, 'malformed FS parameters');
                state.format = {
                    zeros: match[1] === 'T' ? 'trailing' : 'leading',
                    notation: match[2] === 'I' ? 'incremental' : 'absolute',
                    integerDigits: parseInt(match[3], 10),
                    decimalDigits: parseInt(match[4], 10),
                };
                state.formatDeclared = true;
                return;
            }
            case 'MO':
                if (body === 'MOMM') state.unit = 'mm';
                else if (body === 'MOIN') state.unit = 'in';
                else throw new ParseError(location, body, 'unknown unit mode');
                state.unitDeclared = true;
                return;
            case 'AD':
                this.defineAperture(body, location);
                return;
            case 'LP':
                if (body !== 'LPD' && body !== 'LPC') throw new ParseError(location, body, 'unknown polarity');
                this.flushStroke();
                state.polarity = body === 'LPD' ? 'dark' : 'clear';
                return;
            case 'LM': {
                const mirroring = MIRRORING[body.slice(2)];
                if (!mirroring) throw new ParseError(location, body, 'mirroring must be N, X, Y or XY');
                this.setTransform({ ...mirroring });
                return;
            }
            case 'LR': {
                const rotation = Number(body.slice(2));
                if (body.length === 2 || !Number.isFinite(rotation)) {
                    throw new ParseError(location, body, 'malformed rotation angle');
                }
                this.setTransform({ rotation });
                return;
            }
            case 'LS': {
                const scale = Number(body.slice(2));
                if (body.length === 2 || !Number.isFinite(scale) || scale <= 0) {
                    throw new ParseError(location, body, 'scale factor must be a positive number');
                }
                this.setTransform({ scale });
                return;
            }
            case 'SR':
                if (body !== 'SR' && !/^SRX1Y1(I[\d.]+)?(J[\d.]+)?$/.test(body)) {
                    throw new ParseError(location, body, 'step and repeat is not supported');
                }
                return;
            case 'IP':
                if (body !== 'IPPOS') throw new ParseError(location, body, 'negative image polarity is not supported');
                return;
            case 'OF':
            case 'MI':
            case 'SF':
            case 'IR':
            case 'AS':
                if (!/^(OFA0B0|OFA0\.?0*B0\.?0*|MIA0B0|SFA1B1|SFA1\.?0*B1\.?0*|IR0|ASAXBY)$/.test(body)) {
                    throw new ParseError(location, body, 'image transformations are not supported');
                }
                return;
            default:
                throw new ParseError(location, body, 'unknown extended command');
        }
    }

    private setTransform(change: Partial<ApertureTransform>): void {
        // A stroke is drawn with one image transform throughout.
        this.flushStroke();
        this.state.transform = { ...this.state.transform, ...change };
    }

    private defineMacro(name: string, statements: GerberStatement[], location: SourceLocation): void {
        if (!/^[A-Za-z_$.][\w.$-]*$/.test(name)) {
            throw new ParseError(location, `AM${name}`, 'malformed aperture macro name');
        }
        this.state.macros.set(name, { name, location, statements });
    }

    private defineAperture(body: string, location: SourceLocation): void {
        const match = APERTURE_PATTERN.exec(body);
        if (!match) throw new ParseError(location, body, 'malformed aperture definition');

        const code = parseInt(match[1], 10);
        if (code < 10) throw new ParseError(location, body, 'aperture numbers start at D10');

        const params = match[3] === undefined || match[3] === ''
            ? []
            : match[3].split('X').map((part) => {
                const value = Number(part);
                if (part === '' || !Number.isFinite(value)) {
                    throw new ParseError(location, body, `malformed aperture parameter '${part}'`);
                }
                return value;
            });

        const template = this.apertureTemplate(match[2], params, body, location);
        this.state.apertures.set(code, { ...template, code });
    }

    private apertureTemplate(name: string, params: number[], body: string, location: SourceLocation): ApertureTemplate {
        const scale = LENGTH_FACTORS[this.state.unit];
        const expect = (min: number, max: number): void => {
            if (params.length < min || params.length > max) {
                throw new ParseError(location, body, `aperture ${name} takes ${min} to ${max} parameters`);
            }
        };
        const hole = (index: number): { holeDiameter?: number } =>
            params.length > index && params[index] > 0 ? { holeDiameter: params[index] * scale } : {};

        switch (name) {
            case 'C':
                expect(1, 2);
                return { shape: 'circle', diameter: params[0] * scale, ...hole(1) };
            case 'R':
                expect(2, 3);
                return { shape: 'rectangle', width: params[0] * scale, height: params[1] * scale, ...hole(2) };
            case 'O':
                expect(2, 3);
                return { shape: 'obround', width: params[0] * scale, height: params[1] * scale, ...hole(2) };
            case 'P': {
                expect(2, 4);
                const vertices = params[1];
                if (!Number.isInteger(vertices) || vertices < 3 || vertices > 12) {
                    throw new ParseError(location, body, 'polygon apertures need 3 to 12 vertices');
                }
                return {
                    shape: 'polygon',
                    outerDiameter: params[0] * scale,
                    vertices,
                    rotation: params[2] ?? 0,
                    ...hole(3),
                };
            }
            default: {
                const macro = this.state.macros.get(name);
                if (!macro) throw new ParseError(location, body, `aperture macro '${name}' is not defined`);
                return { shape: 'macro', name, parts: expandMacro(macro, params, scale) };
            }
        }
    }

    private word(token: GerberToken): void {
        const { body, location } = token;
        const { state } = this;

        if (/^G0?4(?!\d)/.test(body)) return;

        if (body === 'M02' || body === 'M2' || body === 'M00' || body === 'M0') {
            this.flushStroke();
            state.ended = true;
            return;
        }
        if (body === 'M01' || body === 'M1') return;

        const match = WORD_PATTERN.exec(body);
        if (!match || body.length === 0) {
            throw new ParseError(location, body, 'unknown or malformed command');
        }
        const [, g, x, y, i, j, d] = match;

        if (g !== undefined) {
            this.gCode(parseInt(g, 10), body, location);
        }

        const hasCoordinates = x !== undefined || y !== undefined || i !== undefined || j !== undefined;
        const dCode = d === undefined ? null : parseInt(d, 10);

        if (dCode !== null && dCode >= 10) {
            if (hasCoordinates) throw new ParseError(location, body, 'aperture selection cannot carry coordinates');
            const aperture = state.apertures.get(dCode);
            if (!aperture) throw new ParseError(location, body, `aperture D${dCode} is not defined`);
            this.flushStroke();
            state.aperture = aperture;
            return;
        }

        let operation: Operation | null = null;
        if (dCode === 1 || dCode === 2 || dCode === 3) {
            operation = dCode;
        } else if (dCode !== null) {
            throw new ParseError(location, body, `unknown operation D${dCode}`);
        } else if (hasCoordinates) {
            operation = state.lastOperation;
            if (operation === null) {
                throw new ParseError(location, body, 'coordinates without an operation code');
            }
        }
        if (operation === null) return;
        state.lastOperation = operation;

        const target = this.targetPoint(x, y, body, location);
        const offset = {
            x: this.offsetValue(i, body, location),
            y: this.offsetValue(j, body, location),
        };

        switch (operation) {
            case 1:
                this.interpolate(target, offset, body, location);
                break;
            case 2:
                this.move(target);
                break;
            case 3:
                this.flash(target, body, location);
                break;
        }
    }

    private gCode(code: number, body: string, location: SourceLocation): void {
        const { state } = this;
        switch (code) {
            case 1:
                state.interpolation = 'linear';
                return;
            case 2:
                state.interpolation = 'cw';
                return;
            case 3:
                state.interpolation = 'ccw';
                return;
            case 36:
                if (state.region) throw new ParseError(location, body, 'region started inside another region');
                this.flushStroke();
                state.region = { location, contour: null, contourLocation: location };
                return;
            case 37:
                if (!state.region) throw new ParseError(location, body, 'G37 without a matching G36');
                this.closeContour();
                state.region = null;
                return;
            case 74:
                throw new ParseError(location, body, 'single quadrant arcs are not supported');
            case 75:
                return;
            case 70:
                state.unit = 'in';
                state.unitDeclared = true;
                return;
            case 71:
                state.unit = 'mm';
                state.unitDeclared = true;
                return;
            case 90:
                state.format = { ...state.format, notation: 'absolute' };
                return;
            case 91:
                state.format = { ...state.format, notation: 'incremental' };
                return;
            case 54:
            case 55:
                return;
            default:
                throw new ParseError(location, body, `unknown G-code G${code}`);
        }
    }

    private decode(text: string, body: string, location: SourceLocation): number {
        try {
            return decodeCoordinate(text, this.state.format) * LENGTH_FACTORS[this.state.unit];
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            throw new ParseError(location, body, reason);
        }
    }

    private targetPoint(x: string | undefined, y: string | undefined, body: string, location: SourceLocation): Point {
        const { position, format } = this.state;
        const incremental = format.notation === 'incremental';
        const axis = (text: string | undefined, current: number): number => {
            if (text === undefined) return current;
            const value = this.decode(text, body, location);
            return incremental ? current + value : value;
        };
        return { x: axis(x, position.x), y: axis(y, position.y) };
    }

    private offsetValue(text: string | undefined, body: string, location: SourceLocation): number {
        return text === undefined ? 0 : this.decode(text, body, location);
    }

    private interpolate(target: Point, offset: Point, body: string, location: SourceLocation): void {
        const { state } = this;
        const from = state.position;
        let points: Point[];
        if (state.interpolation === 'linear') {
            points = [target];
        } else {
            const center = { x: from.x + offset.x, y: from.y + offset.y };
            if (samePoint(center, from)) {
                throw new ParseError(location, body, 'arc has zero radius');
            }
            points = linearizeArc(from, target, center, state.interpolation);
        }

        if (state.region) {
            const region = state.region;
            if (!region.contour) {
                region.contour = [{ ...from }];
                region.contourLocation = location;
            }
            region.contour.push(...points);
        } else {
            const aperture = state.aperture;
            if (!aperture) throw new ParseError(location, body, 'plotting without a selected aperture');
            if (aperture.shape !== 'circle') {
                throw new ParseError(location, body, `stroking with ${aperture.shape} aperture D${aperture.code} is not supported`);
            }
            if (!state.stroke) {
                state.stroke = {
                    aperture,
                    polarity: state.polarity,
                    transform: activeTransform(state.transform),
                    path: [{ ...from }],
                    location,
                };
            }
            state.stroke.path.push(...points);
        }
        state.position = target;
    }

    private move(target: Point): void {
        const { state } = this;
        if (state.region) {
            this.closeContour();
        } else {
            this.flushStroke();
        }
        state.position = target;
    }

    private flash(target: Point, body: string, location: SourceLocation): void {
        const { state } = this;
        if (state.region) throw new ParseError(location, body, 'flash inside a region');
        const aperture = state.aperture;
        if (!aperture) throw new ParseError(location, body, 'flash without a selected aperture');
        this.flushStroke();
        const transform = activeTransform(state.transform);
        state.primitives.push({
            kind: 'flash',
            aperture,
            position: target,
            polarity: state.polarity,
            location,
            ...(transform ? { transform } : {}),
        });
        state.position = target;
    }

    private closeContour(): void {
        const region = this.state.region;
        if (!region || !region.contour) return;
        const contour = region.contour;
        region.contour = null;
        if (contour.length < 2) return;

        const first = contour[0];
        const last = contour[contour.length - 1];
        if (!samePoint(first, last, 1e-6)) {
            throw new ParseError(
                region.contourLocation,
                'G36',
                `region contour starting at (${first.x.toFixed(4)}, ${first.y.toFixed(4)}) mm is not closed`
            );
        }
        contour[contour.length - 1] = { ...first };
        this.state.primitives.push({
            kind: 'region',
            ring: contour,
            polarity: this.state.polarity,
            location: region.contourLocation,
        });
    }

    private flushStroke(): void {
        const stroke = this.state.stroke;
        if (!stroke) return;
        this.state.stroke = null;
        this.state.primitives.push({
            kind: 'stroke',
            aperture: stroke.aperture,
            path: stroke.path,
            polarity: stroke.polarity,
            location: stroke.location,
            ...(stroke.transform ? { transform: stroke.transform } : {}),
        });
    }
}

export const parseGerber = (source: ArtworkSource): ParsedArtwork => new GerberInterpreter(source).run();
