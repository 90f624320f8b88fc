import type { SourceLocation } from '~types/geometry';
import { ParseError } from '@/lib/errors';

export interface GerberStatement {
    body: string;
    location: SourceLocation;
}

// Extended commands come from %...% blocks; words are plain `...*` commands.
// An AM block becomes one macro token holding its primitive statements.
export type GerberToken =
    | ({ kind: 'extended' | 'word' } & GerberStatement)
    | ({ kind: 'macro'; content: GerberStatement[] } & GerberStatement);

const isBlank = (char: string): boolean => char === ' ' || char === '\t' || char === '\r' || char === '\n';

/**
 * Splits Gerber text into commands, keeping the line and column where each
 * command starts. Whitespace inside a command is dropped except in comments.
 */
export const tokenizeGerber = (text: string, source: string): GerberToken[] => {
    const tokens: GerberToken[] = [];
    let line = 1;
    let column = 1;
    let index = 0;

    const advance = (): string => {
        const char = text[index++];
        if (char === '\n') {
            line++;
            column = 1;
        } else {
            column++;
        }
        return char;
    };
    const here = (): SourceLocation => ({ source, line, column });

    while (index < text.length) {
        const char = text[index];
        if (isBlank(char)) {
            advance();
            continue;
        }

        if (char === '%') {
            const blockStart = here();
            advance();
            let body = '';
            let statementStart: SourceLocation | null = null;
            let closed = false;
            const statements: GerberStatement[] = [];
            while (index < text.length) {
                const location = here();
                const next = advance();
                if (next === '%') {
                    closed = true;
                    break;
                }
                if (next === '*') {
                    if (body.length > 0 && statementStart) {
                        statements.push({ body, location: statementStart });
                    }
                    body = '';
                    statementStart = null;
                    continue;
                }
                if (isBlank(next)) continue;
                if (!statementStart) statementStart = location;
                body += next;
            }
            if (!closed) {
                throw new ParseError(blockStart, '%', 'extended command block is never closed with %');
            }
            if (body.length > 0 && statementStart) {
                throw new ParseError(statementStart, body, "extended command is missing its '*' terminator");
            }
            const [head, ...rest] = statements;
            if (head && head.body.startsWith('AM')) {
                tokens.push({ kind: 'macro', ...head, content: rest });
            } else {
                tokens.push(...statements.map((statement): GerberToken => ({ kind: 'extended', ...statement })));
            }
            continue;
        }

        const start = here();
        let body = '';
        let terminated = false;
        while (index < text.length) {
            const next = text[index];
            if (next === '%') break;
            advance();
            if (next === '*') {
                terminated = true;
                break;
            }
            if (next === '\r' || next === '\n') continue;
            body += next;
        }
        if (!terminated) {
            throw new ParseError(start, body.trim(), "command is missing its '*' terminator");
        }
        // Comments keep their spaces, everything else is compacted.
        const compact = /^G0?4(?!\d)/.test(body) ? body.trim() : body.replace(/\s+/g, '');
        if (compact.length > 0) {
            tokens.push({ kind: 'word', body: compact, location: start });
        }
    }

    return tokens;
};
