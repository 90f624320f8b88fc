import type {
    AngularSpeed,
    AngularSpeedUnit,
    Length,
    LengthUnit,
    Power,
    PowerUnit,
    QuantityKind,
    Speed,
    SpeedUnit,
    UnitSystem,
} from '~types/units';

// Factors to the canonical unit of each kind: mm, mm/s, W, rpm.
export const LENGTH_FACTORS: Record<LengthUnit, number> = {
    mm: 1,
    cm: 10,
    um: 0.001,
    in: 25.4,
    mil: 0.0254,
};

export const SPEED_FACTORS: Record<SpeedUnit, number> = {
    'mm/s': 1,
    'mm/min': 1 / 60,
    'in/s': 25.4,
    'in/min': 25.4 / 60,
};

export const POWER_FACTORS: Record<PowerUnit, number> = {
    W: 1,
    mW: 0.001,
    kW: 1000,
};

export const ANGULAR_SPEED_FACTORS: Record<AngularSpeedUnit, number> = {
    rpm: 1,
    rps: 60,
};

export const UNITS_BY_KIND: Record<QuantityKind, readonly string[]> = {
    length: Object.keys(LENGTH_FACTORS),
    speed: Object.keys(SPEED_FACTORS),
    power: Object.keys(POWER_FACTORS),
    angularSpeed: Object.keys(ANGULAR_SPEED_FACTORS),
};

export const length = (magnitude: number, unit: LengthUnit = 'mm'): Length => ({ magnitude, unit });
export const speed = (magnitude: number, unit: SpeedUnit = 'mm/s'): Speed => ({ magnitude, unit });
export const power = (magnitude: number, unit: PowerUnit = 'W'): Power => ({ magnitude, unit });
export const angularSpeed = (magnitude: number, unit: AngularSpeedUnit = 'rpm'): AngularSpeed => ({ magnitude, unit });

export const toMillimeters = (value: Length): number => value.magnitude * LENGTH_FACTORS[value.unit];
export const toMillimetersPerSecond = (value: Speed): number => value.magnitude * SPEED_FACTORS[value.unit];
export const toWatts = (value: Power): number => value.magnitude * POWER_FACTORS[value.unit];
export const toRpm = (value: AngularSpeed): number => value.magnitude * ANGULAR_SPEED_FACTORS[value.unit];

/**
 * Length and feed units G-code uses for a machine's unit system.
 */
export const machineUnits = (system: UnitSystem): { length: LengthUnit; feed: SpeedUnit } =>
    system === 'metric' ? { length: 'mm', feed: 'mm/min' } : { length: 'in', feed: 'in/min' };

const hasKey = (table: object, key: string): boolean => Object.prototype.hasOwnProperty.call(table, key);

export const isLengthUnit = (unit: string): unit is LengthUnit => hasKey(LENGTH_FACTORS, unit);
export const isSpeedUnit = (unit: string): unit is SpeedUnit => hasKey(SPEED_FACTORS, unit);
export const isPowerUnit = (unit: string): unit is PowerUnit => hasKey(POWER_FACTORS, unit);
export const isAngularSpeedUnit = (unit: string): unit is AngularSpeedUnit => hasKey(ANGULAR_SPEED_FACTORS, unit);
