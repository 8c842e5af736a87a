import winston from 'winston';

const { combine, timestamp, errors, json } = winston.format;

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        errors({ stack: true }),
        timestamp(),
        json()
    ),
    defaultMeta: { service: 'lexicon-reader-api' },
    transports: [
        new winston.transports.Console({
            // keep test output readable
            silent: process.env.NODE_ENV === 'test'
        })
    ]
});
