import { UnknownVitalError } from './errors.js';
import type { VitalBound, VitalName } from './types.js';

export class RangeTable {
    private readonly bounds: readonly VitalBound[];
    private readonly byName = new Map<string, VitalBound>();

    constructor(bounds: readonly VitalBound[]) {
        for (const bound of bounds) {
            if (bound.min > bound.max) {
                throw new Error(
                    `Invalid bound for ${bound.name}: min ${bound.min} exceeds max ${bound.max}`,
                );
            }
            if (this.byName.has(bound.name)) {
                throw new Error(`Duplicate bound for ${bound.name}`);
            }
            this.byName.set(bound.name, Object.freeze({ ...bound }));
        }
        this.bounds = Object.freeze([...this.byName.values()]);
    }

    /**
     * Look up the inclusive normal range of a vital
     */
    boundsFor(vitalName: string): VitalBound {
        const bound = this.byName.get(vitalName);
        if (!bound) {
            throw new UnknownVitalError(vitalName);
        }
        return bound;
    }

    entries(): readonly VitalBound[] {
        return this.bounds;
    }
}

const DEFAULT_BOUNDS: ReadonlyArray<VitalBound & { name: VitalName }> = [
    { name: 'Systolic BP', min: 90, max: 120 },
    { name: 'Diastolic BP', min: 60, max: 80 },
    { name: 'Heart Rate', min: 60, max: 100 }, // resting, beats/min
    { name: 'Blood Sugar', min: 70, max: 140 }, // mg/dL, after a meal
    { name: 'BMI', min: 18.5, max: 24.9 },
    { name: 'Oxygen Saturation', min: 95, max: 100 }, // SpO2 %
    { name: 'Sleep Hours', min: 7, max: 9 },
    { name: 'Water Intake', min: 2, max: 4 }, // liters per day
];

export const DEFAULT_RANGE_TABLE = new RangeTable(DEFAULT_BOUNDS);
