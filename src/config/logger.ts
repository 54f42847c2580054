import pino from 'pino';
import { loadConfig } from './env.js';

const config = loadConfig();

function transportFor(env: string | undefined): pino.TransportSingleOptions | undefined {
    if (env === 'test') return undefined;

    // stdout carries the health report, logs go to stderr
    if (env === 'production') {
        return { target: 'pino/file', options: { destination: 2 } };
    }

    return {
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
        },
    };
}

export const logger = pino({
    level: config.log.level,
    transport: transportFor(process.env.NODE_ENV),
});
