import { logger } from './config/logger.js';
import type { MonitorMode } from './config/env.js';
import type { SchemaValidator } from './contracts/schema-validator.js';
import { ACCEPTANCE_WINDOWS } from './input/acceptance.js';
import { collectReadings, type PromptIO } from './input/prompt.js';
import { loadReadingsFile, type ReadingsFile } from './input/readings-file.js';
import { ReadingsFileError } from './input/errors.js';
import type { Metrics } from './metrics/counter.js';
import {
    renderBanner,
    renderClosing,
    renderDemoAlerts,
    renderFinalReport,
    renderHandOff,
    renderSample,
    type LineWriter,
} from './report/presenter.js';
import { SAMPLE_READINGS } from './report/sample.js';
import type { VitalsEvaluator } from './rules/engine.js';
import type { Alert, ReadingSet } from './rules/types.js';

export interface SessionDeps {
    evaluator: VitalsEvaluator;
    validator: SchemaValidator;
    metrics: Metrics;
    // Only interactive mode asks questions
    prompt?: PromptIO;
    out: LineWriter;
    clock?: () => Date;
}

export interface SessionOptions {
    maxAttempts: number;
    readingsPath: string;
}

export class MonitorSession {
    constructor(
        private deps: SessionDeps,
        private options: SessionOptions,
    ) { }

    private show(lines: readonly string[]): void {
        lines.forEach((line) => this.deps.out(line));
    }

    private evaluate(readings: ReadingSet, source: string): Alert[] {
        const alerts = this.deps.evaluator.evaluate(readings);

        this.deps.metrics.incrementEvaluations();
        this.deps.metrics.addAlertsRaised(alerts.length);
        logger.info(
            { source, alerts: alerts.map((a) => a.vitalName) },
            alerts.length > 0 ? 'Abnormal readings found' : 'All readings normal',
        );

        return alerts;
    }

    /**
     * Evaluate the built-in sample reading set and print its alerts
     */
    runDemo(): Alert[] {
        this.show(renderSample(SAMPLE_READINGS));
        const alerts = this.evaluate({ ...SAMPLE_READINGS }, 'sample');
        this.show(renderDemoAlerts(alerts));
        return alerts;
    }

    /**
     * Evaluate the user's readings and print the final report
     */
    runReport(readings: ReadingSet, recordedAt?: string): Alert[] {
        const alerts = this.evaluate(readings, 'user');
        const clock = this.deps.clock ?? (() => new Date());
        this.show(renderFinalReport(alerts, recordedAt ?? clock().toISOString()));
        return alerts;
    }

    private readFile(): ReadingsFile {
        try {
            return loadReadingsFile(this.options.readingsPath, this.deps.validator);
        } catch (err) {
            if (err instanceof ReadingsFileError) {
                this.deps.metrics.incrementFilesRejected();
            }
            throw err;
        }
    }

    private async collect(): Promise<ReadingSet> {
        if (!this.deps.prompt) {
            throw new Error('Interactive mode needs a prompt');
        }

        return collectReadings(this.deps.prompt, ACCEPTANCE_WINDOWS, {
            maxAttempts: this.options.maxAttempts,
            metrics: this.deps.metrics,
        });
    }

    async run(mode: MonitorMode): Promise<void> {
        try {
            this.show(renderBanner());
            this.runDemo();

            if (mode === 'file') {
                this.show(renderHandOff(this.options.readingsPath));
                const { readings, recordedAt } = this.readFile();
                this.runReport(readings, recordedAt);
            } else if (mode === 'interactive') {
                this.show(renderHandOff());
                this.runReport(await this.collect());
            }

            this.show(renderClosing());
        } finally {
            logger.info({ mode, ...this.deps.metrics.getCounters() }, 'Session finished');
        }
    }
}
