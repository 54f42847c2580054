#!/usr/bin/env node
import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { TerminalPrompt } from './input/terminal.js';
import { Metrics } from './metrics/counter.js';
import { DEFAULT_RANGE_TABLE } from './rules/range-table.js';
import { VitalsEvaluator } from './rules/engine.js';
import { MonitorSession } from './session.js';

async function main() {
    // Load configuration
    const config = loadConfig();
    logger.info({ config }, 'Starting health vitals monitor');

    // Initialize schema validator
    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();

    const evaluator = new VitalsEvaluator(DEFAULT_RANGE_TABLE);
    const metrics = new Metrics();
    // stdin is only opened when the user is asked for readings
    const prompt = config.mode === 'interactive' ? new TerminalPrompt() : undefined;

    const session = new MonitorSession(
        {
            evaluator,
            validator,
            metrics,
            prompt,
            out: prompt
                ? (line) => prompt.say(line)
                : (line) => {
                    process.stdout.write(`${line}\n`);
                },
        },
        {
            maxAttempts: config.input.maxAttempts,
            readingsPath: config.readings.path,
        },
    );

    try {
        await session.run(config.mode);
    } finally {
        prompt?.close();
    }
}

main().catch((err) => {
    logger.error({ error: err }, 'Health vitals monitor failed');
    process.exit(1);
});
