import winston from 'winston';
import config from '../config';

const isProduction = config.app.nodeEnv === 'production';

const developmentFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.colorize(),
    winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} ${level}: ${String(message)}${extra}${stack ? `\n${String(stack)}` : ''}`;
    })
);

const productionFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

export const logger = winston.createLogger({
    level: config.logging.level,
    format: isProduction ? productionFormat : developmentFormat,
    transports: [new winston.transports.Console()],
    silent: process.env.NODE_ENV === 'test',
    exitOnError: false,
});

/**
 * Shorten a token identifier for log output
 */
export function maskId(id: string): string {
    return id.length > 8 ? `${id.substring(0, 8)}...` : id;
}

export default logger;
