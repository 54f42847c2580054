import { READING_FIELDS, type Alert, type ReadingSet } from '../rules/types.js';

export type LineWriter = (line: string) => void;

export const SUGGESTION_LINE = '💡 Suggestion: Please consult a doctor / improve lifestyle where needed.';
export const DEMO_ALL_NORMAL_LINE = ' ✅ All vitals within normal range!';
export const REPORT_ALL_NORMAL_LINE = ' ✅ Congratulations! All your vitals are within the healthy range.';

const SEPARATOR = '-----------------------------------';

function alertLines(alerts: readonly Alert[]): string[] {
    return alerts.map((alert) => `  ${alert.message}`);
}

export function renderBanner(): string[] {
    return ['', '🏥 Healthcare Monitoring & Alert System', ''];
}

export function renderSample(readings: Readonly<ReadingSet>): string[] {
    return [
        'Using sample data for demo:',
        ...READING_FIELDS.map((field) => ` - ${field}: ${readings[field]}`),
    ];
}

export function renderDemoAlerts(alerts: readonly Alert[]): string[] {
    const body = alerts.length > 0 ? alertLines(alerts) : [DEMO_ALL_NORMAL_LINE];
    return ['', '🔍 Alerts from sample data:', ...body];
}

export function renderHandOff(readingsPath?: string): string[] {
    const heading = readingsPath === undefined
        ? 'Now enter your own health details 👇'
        : `Reading your health details from ${readingsPath}`;
    return ['', SEPARATOR, heading, SEPARATOR];
}

/**
 * Final report for the user's own readings. The suggestion line only
 * follows a non-empty alert list.
 */
export function renderFinalReport(alerts: readonly Alert[], generatedAt: string): string[] {
    const lines = ['', '📝 Final Health Report', '--------------------------', `Generated: ${generatedAt}`];

    if (alerts.length > 0) {
        lines.push(...alertLines(alerts), '', SUGGESTION_LINE);
    } else {
        lines.push(REPORT_ALL_NORMAL_LINE);
    }

    return lines;
}

export function renderClosing(): string[] {
    return ['', 'Done ✅ Stay Healthy!', ''];
}
