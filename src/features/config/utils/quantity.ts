import type { AngularSpeed, Length, PhysicalUnit, Power, QuantityKind, Speed, UnitValue } from '~types/units';
import { ConfigError } from '@/lib/errors';
import {
    UNITS_BY_KIND,
    isAngularSpeedUnit,
    isLengthUnit,
    isPowerUnit,
    isSpeedUnit,
} from '@/features/units/utils/unitValue';

const QUANTITY_PATTERN = /^([+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)\s*([A-Za-z][A-Za-z/]*)$/;

/**
 * Reads strings such as `0.25mm`, `600 mm/min`, `5W` or `12000rpm`.
 */
const parseQuantity = <U extends PhysicalUnit>(
    text: string,
    kind: QuantityKind,
    isUnit: (unit: string) => unit is U,
    path: string
): UnitValue<U> => {
    const match = QUANTITY_PATTERN.exec(text.trim());
    if (!match) {
        throw new ConfigError(path, `'${text}' is not a ${kind} with a unit`);
    }
    const unit = match[2];
    if (!isUnit(unit)) {
        throw new ConfigError(path, `unknown ${kind} unit '${unit}', expected one of ${UNITS_BY_KIND[kind].join(', ')}`);
    }
    return { magnitude: Number(match[1]), unit };
};

export const parseLength = (text: string, path: string = ''): Length => parseQuantity(text, 'length', isLengthUnit, path);
export const parseSpeed = (text: string, path: string = ''): Speed => parseQuantity(text, 'speed', isSpeedUnit, path);
export const parsePower = (text: string, path: string = ''): Power => parseQuantity(text, 'power', isPowerUnit, path);
export const parseAngularSpeed = (text: string, path: string = ''): AngularSpeed =>
    parseQuantity(text, 'angularSpeed', isAngularSpeedUnit, path);
