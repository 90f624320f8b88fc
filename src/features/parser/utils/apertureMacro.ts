import type { MacroPart, Point, Polarity, SourceLocation } from '~types/geometry';
import { ParseError } from '@/lib/errors';
import { circleRing } from '@/features/geometry/utils/arcs';
import { closeRing } from '@/features/geometry/utils/polygon';
import type { GerberStatement } from './gerberTokenizer';

export interface MacroDefinition {
    name: string;
    location: SourceLocation;
    statements: GerberStatement[];
}

type Variables = Map<number, number>;

/**
 * Recursive descent over macro arithmetic: `+ - x /`, parentheses, unary
 * signs and `$n` variables. `x` is multiplication.
 */
class ExpressionReader {
    private index = 0;

    constructor(
        private readonly text: string,
        private readonly variables: Variables,
        private readonly fail: (reason: string) => ParseError
    ) {}

    read(): number {
        const value = this.sum();
        if (this.index < this.text.length) {
            throw this.fail(`unexpected '${this.text[this.index]}' in expression '${this.text}'`);
        }
        return value;
    }

    private peek(): string {
        return this.text[this.index] ?? '';
    }

    private sum(): number {
        let value = this.product();
        for (let op = this.peek(); op === '+' || op === '-'; op = this.peek()) {
            this.index++;
            const right = this.product();
            value = op === '+' ? value + right : value - right;
        }
        return value;
    }

    private product(): number {
        let value = this.factor();
        for (let op = this.peek(); op === 'x' || op === 'X' || op === '/'; op = this.peek()) {
            this.index++;
            const right = this.factor();
            value = op === '/' ? value / right : value * right;
        }
        return value;
    }

    private factor(): number {
        const char = this.peek();
        if (char === '+' || char === '-') {
            this.index++;
            const value = this.factor();
            return char === '-' ? -value : value;
        }
        if (char === '(') {
            this.index++;
            const value = this.sum();
            if (this.peek() !== ')') throw this.fail(`missing ')' in expression '${this.text}'`);
            this.index++;
            return value;
        }
        if (char === '$') {
            const match = /^\$(\d+)/.exec(this.text.slice(this.index));
            if (!match) throw this.fail(`malformed variable in expression '${this.text}'`);
            this.index += match[0].length;
            const id = parseInt(match[1], 10);
            const value = this.variables.get(id);
            if (value === undefined) throw this.fail(`macro variable $${id} is not defined`);
            return value;
        }
        const match = /^(\d+\.?\d*|\.\d+)/.exec(this.text.slice(this.index));
        if (!match) throw this.fail(`malformed expression '${this.text}'`);
        this.index += match[0].length;
        return parseFloat(match[1]);
    }
}

export const evaluateExpression = (text: string, variables: Variables, fail: (reason: string) => ParseError): number =>
    new ExpressionReader(text, variables, fail).read();

const rotate = (ring: Point[], degrees: number): Point[] => {
    if (degrees % 360 === 0) return ring;
    const angle = (degrees * Math.PI) / 180;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return ring.map((p) => ({ x: p.x * cos - p.y * sin, y: p.x * sin + p.y * cos }));
};

const PRIMITIVE_NAMES: Record<number, string> = {
    1: 'circle',
    2: 'vector line',
    20: 'vector line',
    21: 'center line',
    4: 'outline',
    5: 'polygon',
    6: 'moire',
    7: 'thermal',
};

/**
 * Evaluates a macro with the parameters of an aperture definition. Lengths in
 * the result are millimetres; `unitScale` converts from the file's unit.
 */
export const expandMacro = (definition: MacroDefinition, params: number[], unitScale: number): MacroPart[] => {
    const variables: Variables = new Map(params.map((value, i) => [i + 1, value]));
    const parts: MacroPart[] = [];

    for (const { body, location } of definition.statements) {
        const fail = (reason: string): ParseError =>
            new ParseError(location, body, `${reason} in macro '${definition.name}'`);
        // Comment primitive.
        if (body.startsWith('0')) continue;

        const assignment = /^\$(\d+)=(.+)$/.exec(body);
        if (assignment) {
            variables.set(parseInt(assignment[1], 10), evaluateExpression(assignment[2], variables, fail));
            continue;
        }

        const [codeText, ...fields] = body.split(',');
        const code = Number(codeText);
        const name = PRIMITIVE_NAMES[code];
        if (!Number.isInteger(code) || name === undefined) throw fail(`unknown macro primitive '${codeText}'`);
        if (code === 6 || code === 7) throw fail(`macro primitive ${code} (${name}) is not supported`);

        const values = fields.map((field) => evaluateExpression(field, variables, fail));
        const expect = (min: number, max: number = min): void => {
            if (values.length < min || values.length > max) {
                throw fail(`${name} primitive takes ${min === max ? min : `${min} to ${max}`} parameters, got ${values.length}`);
            }
        };
        const at = (i: number): number => values[i] * unitScale;

        let ring: Point[];
        switch (code) {
            case 1:
                expect(4, 5);
                if (at(1) <= 0) continue;
                ring = rotate(circleRing({ x: at(2), y: at(3) }, at(1)), values[4] ?? 0);
                break;
            case 2:
            case 20: {
                expect(7);
                const start = { x: at(2), y: at(3) };
                const end = { x: at(4), y: at(5) };
                const length = Math.hypot(end.x - start.x, end.y - start.y);
                if (length === 0 || at(1) <= 0) continue;
                const nx = (-(end.y - start.y) / length) * (at(1) / 2);
                const ny = ((end.x - start.x) / length) * (at(1) / 2);
                ring = rotate(closeRing([
                    { x: start.x - nx, y: start.y - ny },
                    { x: end.x - nx, y: end.y - ny },
                    { x: end.x + nx, y: end.y + ny },
                    { x: start.x + nx, y: start.y + ny },
                ]), values[6]);
                break;
            }
            case 21: {
                expect(6);
                const w = at(1) / 2;
                const h = at(2) / 2;
                if (w <= 0 || h <= 0) continue;
                const cx = at(3);
                const cy = at(4);
                ring = rotate(closeRing([
                    { x: cx - w, y: cy - h },
                    { x: cx + w, y: cy - h },
                    { x: cx + w, y: cy + h },
                    { x: cx - w, y: cy + h },
                ]), values[5]);
                break;
            }
            case 4: {
                const vertices = values[1];
                if (!Number.isInteger(vertices) || vertices < 3) throw fail('outline primitive needs at least 3 vertices');
                expect(2 * vertices + 5);
                const points: Point[] = [];
                for (let i = 0; i <= vertices; i++) {
                    points.push({ x: at(2 + 2 * i), y: at(3 + 2 * i) });
                }
                ring = rotate(closeRing(points), values[2 * vertices + 4]);
                break;
            }
            default: {
                expect(6);
                const vertices = values[1];
                if (!Number.isInteger(vertices) || vertices < 3 || vertices > 12) {
                    throw fail('polygon primitive needs 3 to 12 vertices');
                }
                const radius = at(4) / 2;
                const points: Point[] = [];
                for (let i = 0; i < vertices; i++) {
                    const angle = (2 * Math.PI * i) / vertices;
                    points.push({ x: at(2) + radius * Math.cos(angle), y: at(3) + radius * Math.sin(angle) });
                }
                ring = rotate(closeRing(points), values[5]);
            }
        }

        const exposure = values[0];
        if (exposure !== 0 && exposure !== 1) throw fail(`exposure must be 0 or 1, got ${exposure}`);
        const polarity: Polarity = exposure === 1 ? 'dark' : 'clear';
        parts.push({ polarity, ring });
    }

    return parts;
};
