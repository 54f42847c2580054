import type { ReadingSet } from '../rules/types.js';

// Mostly abnormal on purpose, so the demo run shows every kind of alert
export const SAMPLE_READINGS: Readonly<ReadingSet> = Object.freeze({
    systolic: 135,
    diastolic: 95,
    heart_rate: 110,
    blood_sugar: 180,
    bmi: 27.5,
    oxygen: 92,
    sleep_hours: 5,
    water_liters: 1.5,
});
