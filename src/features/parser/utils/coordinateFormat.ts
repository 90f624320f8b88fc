import type { CoordinateFormat } from '~types/pcb';

export const DEFAULT_GERBER_FORMAT: CoordinateFormat = {
    integerDigits: 3,
    decimalDigits: 6,
    zeros: 'leading',
    notation: 'absolute',
};

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export const isCoordinate = (text: string): boolean => NUMBER_PATTERN.test(text);

/**
 * Decodes one fixed-point coordinate word into file units. Words that carry
 * an explicit decimal point are read as they are.
 */
export const decodeCoordinate = (text: string, format: CoordinateFormat): number => {
    if (!isCoordinate(text)) {
        throw new Error(`malformed coordinate '${text}'`);
    }
    if (text.includes('.')) {
        return parseFloat(text);
    }

    const negative = text.startsWith('-');
    let digits = text.replace(/^[+-]/, '');

    if (format.zeros === 'trailing') {
        const width = format.integerDigits + format.decimalDigits;
        if (digits.length < width) {
            digits = digits.padEnd(width, '0');
        }
    }

    const value = parseInt(digits, 10) / Math.pow(10, format.decimalDigits);
    return negative ? -value : value;
};
