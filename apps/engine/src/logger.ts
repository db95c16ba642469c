import path from 'path';
import winston from 'winston';
import config from './config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

/**
 * "<time> [level] (context): message {meta}"
 */
const lineFormat = printf(({ level, message, timestamp, stack, context, service, ...meta }) => {
    let line = `${timestamp} [${level}] (${context ?? service}): ${message}`;

    if (stack) {
        line += `\n${stack}`;
    }

    if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
    }

    return line;
});

export const logger = winston.createLogger({
    level: config.logging.level,
    silent: config.nodeEnv === 'test',
    format: combine(
        errors({ stack: true }),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        lineFormat
    ),
    defaultMeta: { service: 'blog-pipeline' },
    transports: [
        new winston.transports.Console({
            format: config.isDev
                ? combine(colorize(), lineFormat)
                : lineFormat,
        }),
    ],
});

// Run logs next to the console when LOG_DIR is set
if (config.logging.dir) {
    logger.add(new winston.transports.File({
        filename: path.join(config.logging.dir, 'error.log'),
        level: 'error',
    }));
    logger.add(new winston.transports.File({
        filename: path.join(config.logging.dir, 'generation.log'),
    }));
}

/**
 * Child logger tagged with a component name
 */
export function createLogger(context: string): winston.Logger {
    return logger.child({ context });
}

/**
 * Printable message for an unknown thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

export default logger;
