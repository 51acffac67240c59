import pino from 'pino';
import { env } from '../env';

function buildOptions(): pino.LoggerOptions {
    const options: pino.LoggerOptions = {
        name: 'album-runs',
        level: env.LOG_LEVEL,
    };

    if (env.LOG_PRETTY) {
        options.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        };
    }

    return options;
}

export const logger = pino(buildOptions());
