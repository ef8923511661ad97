import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import bodyParser from 'body-parser';
import * as winston from 'winston';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
    ),
    defaultMeta: { service: process.env.SERVICE_NAME || 'indexsync' },
    transports: [
        new winston.transports.Console()
    ]
});

export type Logger = winston.Logger;

/**
 * Child logger tagged with the component name, e.g. `componentLogger('bulker')`.
 */
export const componentLogger = (component: string): Logger => logger.child({ component });

export const createService = (name: string): Express => {
    const app = express();

    app.use(cors());
    app.use(bodyParser.json({ limit: '1mb' }));

    app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        logger.info(`Incoming request: ${req.method} ${req.url}`);

        res.on('finish', () => {
            const meta = { status: res.statusCode, duration_ms: Date.now() - startedAt };
            if (res.statusCode >= 500) {
                logger.error(`Request failed: ${req.method} ${req.url}`, meta);
            } else {
                logger.info(`Request completed: ${req.method} ${req.url}`, meta);
            }
        });

        next();
    });

    app.get('/health', (req: Request, res: Response) => {
        res.json({ status: 'ok', service: name, timestamp: new Date().toISOString() });
    });

    return app;
};

export const startService = (app: Express, port: number) => {
    return app.listen(port, () => {
        logger.info(`Service listening on port ${port}`);
    });
};
