import { describe, it, expect } from 'vitest';
import { ACCEPTANCE_WINDOWS, type AcceptanceWindow } from '../../../src/input/acceptance.js';
import { collectReadings, parseEntry, promptReading } from '../../../src/input/prompt.js';
import { InputAttemptsExceededError } from '../../../src/input/errors.js';
import { Metrics } from '../../../src/metrics/counter.js';
import type { ReadingField } from '../../../src/rules/types.js';
import { scriptedIO } from '../../helpers/scripted-io.js';

function windowFor(field: ReadingField): AcceptanceWindow {
    const window = ACCEPTANCE_WINDOWS.find((w) => w.field === field);
    if (!window) throw new Error(`No window for ${field}`);
    return window;
}

describe('parseEntry', () => {
    const systolic = windowFor('systolic');
    const bmi = windowFor('bmi');

    it('should accept an integer inside the window', () => {
        expect(parseEntry('120', systolic)).toEqual({ ok: true, value: 120 });
    });

    it('should trim surrounding whitespace', () => {
        expect(parseEntry('  135 \t', systolic)).toEqual({ ok: true, value: 135 });
    });

    it('should accept both window ends', () => {
        expect(parseEntry('50', systolic)).toEqual({ ok: true, value: 50 });
        expect(parseEntry('250', systolic)).toEqual({ ok: true, value: 250 });
    });

    it('should reject a decimal for an integer field', () => {
        expect(parseEntry('120.5', systolic)).toEqual({
            ok: false,
            reason: ' Invalid input! Please enter a number.',
        });
    });

    it('should reject text', () => {
        expect(parseEntry('high', bmi)).toEqual({ ok: false, reason: ' Invalid input! Please enter a number.' });
        expect(parseEntry('', bmi)).toEqual({ ok: false, reason: ' Invalid input! Please enter a number.' });
        expect(parseEntry('Infinity', bmi)).toEqual({ ok: false, reason: ' Invalid input! Please enter a number.' });
    });

    it('should reject values below the window', () => {
        expect(parseEntry('49', systolic)).toEqual({
            ok: false,
            reason: ' Value cannot be less than 50. Try again.',
        });
    });

    it('should reject values above the window', () => {
        expect(parseEntry('251', systolic)).toEqual({
            ok: false,
            reason: ' Value cannot be greater than 250. Try again.',
        });
    });

    it('should accept decimal and exponent forms for float fields', () => {
        expect(parseEntry('27.5', bmi)).toEqual({ ok: true, value: 27.5 });
        expect(parseEntry('1e1', bmi)).toEqual({ ok: true, value: 10 });
        expect(parseEntry('.5', windowFor('water_liters'))).toEqual({ ok: true, value: 0.5 });
    });
});

describe('promptReading', () => {
    it('should retry until an acceptable entry arrives', async () => {
        const io = scriptedIO(['abc', '300', '130']);
        const metrics = new Metrics();

        const value = await promptReading(io, windowFor('systolic'), { maxAttempts: 5, metrics });

        expect(value).toBe(130);
        expect(io.asked).toEqual([
            'Enter Systolic BP (90 - 200): ',
            'Enter Systolic BP (90 - 200): ',
            'Enter Systolic BP (90 - 200): ',
        ]);
        expect(io.said).toEqual([
            ' Invalid input! Please enter a number.',
            ' Value cannot be greater than 250. Try again.',
        ]);
        expect(metrics.getCounters().entries_rejected).toBe(2);
    });

    it('should give up after maxAttempts rejected entries', async () => {
        const io = scriptedIO(['x', 'y', '120']);

        const pending = promptReading(io, windowFor('systolic'), { maxAttempts: 2 });

        await expect(pending).rejects.toBeInstanceOf(InputAttemptsExceededError);
        await expect(pending).rejects.toMatchObject({ field: 'systolic', attempts: 2 });
        expect(io.asked).toHaveLength(2);
    });
});

describe('collectReadings', () => {
    it('should prompt for every field in order', async () => {
        const io = scriptedIO(['110', '70', '75', '100', '22', '98', '8', '3']);

        const readings = await collectReadings(io, ACCEPTANCE_WINDOWS, { maxAttempts: 3 });

        expect(readings).toEqual({
            systolic: 110,
            diastolic: 70,
            heart_rate: 75,
            blood_sugar: 100,
            bmi: 22,
            oxygen: 98,
            sleep_hours: 8,
            water_liters: 3,
        });
        expect(io.asked).toEqual([
            'Enter Systolic BP (90 - 200): ',
            'Enter Diastolic BP (60 - 120): ',
            'Enter Heart Rate (40 - 200): ',
            'Enter Blood Sugar (50 - 300): ',
            'Enter BMI (10 - 40): ',
            'Enter Oxygen % (70 - 100): ',
            'Enter Sleep Hours (0 - 24): ',
            'Enter Water Intake in Liters (0 - 10): ',
        ]);
        expect(io.said).toEqual([]);
    });

    it('should stop at the first field that exhausts its attempts', async () => {
        const io = scriptedIO(['110', 'none']);

        await expect(collectReadings(io, ACCEPTANCE_WINDOWS, { maxAttempts: 1 })).rejects.toMatchObject({
            name: 'InputAttemptsExceededError',
            field: 'diastolic',
        });
    });
});
