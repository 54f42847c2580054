import { MissingFieldError } from './errors.js';
import { DEFAULT_RANGE_TABLE, RangeTable } from './range-table.js';
import type {
    Alert,
    ReadingField,
    ReadingInput,
    ReadingSet,
    VitalBound,
    VitalName,
} from './types.js';

interface SingleValueCheck {
    field: ReadingField;
    vital: VitalName;
    format: (value: number) => string;
}

// Evaluation order after the blood pressure check
const SINGLE_VALUE_CHECKS: readonly SingleValueCheck[] = [
    { field: 'heart_rate', vital: 'Heart Rate', format: (v) => `Heart Rate Abnormal: ${v} bpm` },
    { field: 'blood_sugar', vital: 'Blood Sugar', format: (v) => `Blood Sugar Abnormal: ${v} mg/dL` },
    { field: 'bmi', vital: 'BMI', format: (v) => `BMI Abnormal: ${v.toFixed(1)}` },
    { field: 'oxygen', vital: 'Oxygen Saturation', format: (v) => `Oxygen Level Low: ${v}%` },
    { field: 'sleep_hours', vital: 'Sleep Hours', format: (v) => `Sleep Hours Abnormal: ${v} hrs` },
    { field: 'water_liters', vital: 'Water Intake', format: (v) => `Water Intake Abnormal: ${v} L` },
];

export function isWithin(value: number, bound: VitalBound): boolean {
    return value >= bound.min && value <= bound.max;
}

function numericField(input: ReadingInput, field: ReadingField): number {
    const value = input[field];
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new MissingFieldError(field);
    }
    return value;
}

/**
 * Check that every field holds a number and return the typed reading set.
 * Throws MissingFieldError for the first field (in READING_FIELDS order)
 * that does not.
 */
export function requireReadings(input: ReadingInput): ReadingSet {
    return {
        systolic: numericField(input, 'systolic'),
        diastolic: numericField(input, 'diastolic'),
        heart_rate: numericField(input, 'heart_rate'),
        blood_sugar: numericField(input, 'blood_sugar'),
        bmi: numericField(input, 'bmi'),
        oxygen: numericField(input, 'oxygen'),
        sleep_hours: numericField(input, 'sleep_hours'),
        water_liters: numericField(input, 'water_liters'),
    };
}

export class VitalsEvaluator {
    constructor(private ranges: RangeTable = DEFAULT_RANGE_TABLE) { }

    /**
     * Compare a reading set with the range table and return one alert per
     * abnormal vital, in declaration order. An empty list means all normal.
     */
    evaluate(input: ReadingInput): Alert[] {
        const readings = requireReadings(input);
        const alerts: Alert[] = [];

        // Blood pressure is a single combined check over both components
        const systolicOk = isWithin(readings.systolic, this.ranges.boundsFor('Systolic BP'));
        const diastolicOk = isWithin(readings.diastolic, this.ranges.boundsFor('Diastolic BP'));
        if (!(systolicOk && diastolicOk)) {
            alerts.push({
                vitalName: 'Blood Pressure',
                message: `Blood Pressure Abnormal: ${readings.systolic}/${readings.diastolic} mmHg`,
            });
        }

        for (const check of SINGLE_VALUE_CHECKS) {
            const value = readings[check.field];
            if (!isWithin(value, this.ranges.boundsFor(check.vital))) {
                alerts.push({ vitalName: check.vital, message: check.format(value) });
            }
        }

        return alerts;
    }
}
