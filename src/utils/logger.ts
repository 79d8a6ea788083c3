import winston from 'winston';
import config from '../config/index.js';

const { combine, timestamp, errors, splat, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, context, stack, ...meta }) => {
    const scope = typeof context === 'string' ? ` [${context}]` : '';
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(time)} ${level}${scope}: ${String(message)}${extra}${trace}`;
});

// Every level goes to stderr; stdout belongs to CLI output.
const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), splat(), timestamp(), lineFormat),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
        }),
    ],
});

export function createContextLogger(context: string): winston.Logger {
    return logger.child({ context });
}

export default logger;
