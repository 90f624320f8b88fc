export type LengthUnit = 'mm' | 'cm' | 'um' | 'in' | 'mil';
export type SpeedUnit = 'mm/s' | 'mm/min' | 'in/s' | 'in/min';
export type PowerUnit = 'W' | 'mW' | 'kW';
export type AngularSpeedUnit = 'rpm' | 'rps';

export type PhysicalUnit = LengthUnit | SpeedUnit | PowerUnit | AngularSpeedUnit;

/**
 * A magnitude tagged with its unit. The unit parameter keeps quantities of
 * different kinds apart at compile time.
 */
export interface UnitValue<U extends PhysicalUnit> {
    readonly magnitude: number;
    readonly unit: U;
}

export type Length = UnitValue<LengthUnit>;
export type Speed = UnitValue<SpeedUnit>;
export type Power = UnitValue<PowerUnit>;
export type AngularSpeed = UnitValue<AngularSpeedUnit>;

export type QuantityKind = 'length' | 'speed' | 'power' | 'angularSpeed';

export type UnitSystem = 'metric' | 'imperial';
