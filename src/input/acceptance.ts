import type { ReadingField } from '../rules/types.js';

export type EntryKind = 'int' | 'float';

/**
 * Coarse window a typed entry must fall in before it is accepted as a
 * reading. Much wider than the normal range; it only rejects typos.
 */
export interface AcceptanceWindow {
    field: ReadingField;
    prompt: string;
    kind: EntryKind;
    min: number;
    max: number;
}

export const ACCEPTANCE_WINDOWS: readonly AcceptanceWindow[] = [
    { field: 'systolic', prompt: 'Enter Systolic BP (90 - 200): ', kind: 'int', min: 50, max: 250 },
    { field: 'diastolic', prompt: 'Enter Diastolic BP (60 - 120): ', kind: 'int', min: 30, max: 150 },
    { field: 'heart_rate', prompt: 'Enter Heart Rate (40 - 200): ', kind: 'int', min: 30, max: 250 },
    { field: 'blood_sugar', prompt: 'Enter Blood Sugar (50 - 300): ', kind: 'float', min: 40, max: 400 },
    { field: 'bmi', prompt: 'Enter BMI (10 - 40): ', kind: 'float', min: 10, max: 50 },
    { field: 'oxygen', prompt: 'Enter Oxygen % (70 - 100): ', kind: 'float', min: 70, max: 100 },
    { field: 'sleep_hours', prompt: 'Enter Sleep Hours (0 - 24): ', kind: 'float', min: 0, max: 24 },
    { field: 'water_liters', prompt: 'Enter Water Intake in Liters (0 - 10): ', kind: 'float', min: 0, max: 10 },
];
