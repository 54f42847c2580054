import { logger } from '../config/logger.js';
import { requireReadings } from '../rules/engine.js';
import type { ReadingField, ReadingSet } from '../rules/types.js';
import type { Metrics } from '../metrics/counter.js';
import type { AcceptanceWindow, EntryKind } from './acceptance.js';
import { InputAttemptsExceededError } from './errors.js';

export interface PromptIO {
    ask(question: string): Promise<string>;
    say(line: string): void;
}

export type EntryResult =
    | { ok: true; value: number }
    | { ok: false; reason: string };

export interface PromptOptions {
    maxAttempts: number;
    metrics?: Metrics;
}

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseNumber(text: string, kind: EntryKind): number | undefined {
    const pattern = kind === 'int' ? INT_PATTERN : FLOAT_PATTERN;
    if (!pattern.test(text)) return undefined;
    const value = kind === 'int' ? parseInt(text, 10) : Number(text);
    return Number.isFinite(value) ? value : undefined;
}

/**
 * Parse one typed entry and check it against the field's acceptance window
 */
export function parseEntry(text: string, window: AcceptanceWindow): EntryResult {
    const value = parseNumber(text.trim(), window.kind);

    if (value === undefined) {
        return { ok: false, reason: ' Invalid input! Please enter a number.' };
    }
    if (value < window.min) {
        return { ok: false, reason: ` Value cannot be less than ${window.min}. Try again.` };
    }
    if (value > window.max) {
        return { ok: false, reason: ` Value cannot be greater than ${window.max}. Try again.` };
    }

    return { ok: true, value };
}

/**
 * Ask for one reading until an acceptable entry arrives, at most maxAttempts times
 */
export async function promptReading(
    io: PromptIO,
    window: AcceptanceWindow,
    options: PromptOptions,
): Promise<number> {
    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
        const answer = await io.ask(window.prompt);
        const result = parseEntry(answer, window);

        if (result.ok) {
            return result.value;
        }

        options.metrics?.incrementEntriesRejected();
        logger.debug({ field: window.field, attempt, answer }, 'Entry rejected');
        io.say(result.reason);
    }

    throw new InputAttemptsExceededError(window.field, options.maxAttempts);
}

/**
 * Prompt for every field in window order and return the complete reading set
 */
export async function collectReadings(
    io: PromptIO,
    windows: readonly AcceptanceWindow[],
    options: PromptOptions,
): Promise<ReadingSet> {
    const entered: Partial<Record<ReadingField, number>> = {};

    for (const window of windows) {
        entered[window.field] = await promptReading(io, window, options);
    }

    return requireReadings(entered);
}
