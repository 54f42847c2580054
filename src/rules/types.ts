export const READING_FIELDS = [
    'systolic',
    'diastolic',
    'heart_rate',
    'blood_sugar',
    'bmi',
    'oxygen',
    'sleep_hours',
    'water_liters',
] as const;

export type ReadingField = (typeof READING_FIELDS)[number];

export type ReadingSet = Record<ReadingField, number>;

/**
 * Reading set as handed over by a collaborator, before the evaluator has
 * checked that every field holds a number.
 */
export type ReadingInput = { readonly [K in ReadingField]?: unknown };

export type VitalName =
    | 'Systolic BP'
    | 'Diastolic BP'
    | 'Heart Rate'
    | 'Blood Sugar'
    | 'BMI'
    | 'Oxygen Saturation'
    | 'Sleep Hours'
    | 'Water Intake';

export interface VitalBound {
    name: string;
    min: number;
    max: number;
}

export interface Alert {
    vitalName: string;
    message: string;
}
