import { describe, it, expect } from 'vitest';
import {
    REPORT_ALL_NORMAL_LINE,
    SUGGESTION_LINE,
    renderDemoAlerts,
    renderFinalReport,
    renderHandOff,
    renderSample,
} from '../../../src/report/presenter.js';
import { SAMPLE_READINGS } from '../../../src/report/sample.js';
import type { Alert } from '../../../src/rules/types.js';

const alerts: Alert[] = [
    { vitalName: 'Heart Rate', message: 'Heart Rate Abnormal: 110 bpm' },
    { vitalName: 'BMI', message: 'BMI Abnormal: 27.5' },
];

describe('Report Rendering', () => {
    it('should list the sample readings field by field', () => {
        expect(renderSample(SAMPLE_READINGS)).toEqual([
            'Using sample data for demo:',
            ' - systolic: 135',
            ' - diastolic: 95',
            ' - heart_rate: 110',
            ' - blood_sugar: 180',
            ' - bmi: 27.5',
            ' - oxygen: 92',
            ' - sleep_hours: 5',
            ' - water_liters: 1.5',
        ]);
    });

    it('should indent demo alerts', () => {
        expect(renderDemoAlerts(alerts)).toEqual([
            '',
            '🔍 Alerts from sample data:',
            '  Heart Rate Abnormal: 110 bpm',
            '  BMI Abnormal: 27.5',
        ]);
    });

    it('should print the all-normal line for an empty demo', () => {
        expect(renderDemoAlerts([])).toEqual(['', '🔍 Alerts from sample data:', ' ✅ All vitals within normal range!']);
    });

    it('should end an abnormal report with the suggestion', () => {
        expect(renderFinalReport(alerts, '2026-10-18T09:00:00.000Z')).toEqual([
            '',
            '📝 Final Health Report',
            '--------------------------',
            'Generated: 2026-10-18T09:00:00.000Z',
            '  Heart Rate Abnormal: 110 bpm',
            '  BMI Abnormal: 27.5',
            '',
            SUGGESTION_LINE,
        ]);
    });

    it('should congratulate on a normal report without a suggestion', () => {
        const lines = renderFinalReport([], '2026-10-18T09:00:00.000Z');
        expect(lines.at(-1)).toBe(REPORT_ALL_NORMAL_LINE);
        expect(lines).not.toContain(SUGGESTION_LINE);
    });

    it('should name the readings file in the hand-off', () => {
        expect(renderHandOff('./readings.json')[2]).toBe('Reading your health details from ./readings.json');
        expect(renderHandOff()[2]).toBe('Now enter your own health details 👇');
    });
});
