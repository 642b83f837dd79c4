/**
 * Express application: health check, monitor routes, error handling.
 */

import express, { type Express } from 'express';
import { errorHandler } from './middleware/errorHandler.js';
import monitorRoutes from './routes/monitor.js';
import { requestLogger } from './utils/logger.js';

export function createApp(): Express {
    const app = express();

    app.use(express.json({ limit: '100kb' }));
    app.use(requestLogger);

    app.get('/api/health', (_req, res) => {
        res.json({ status: 'ok', uptimeSeconds: Math.round(process.uptime()) });
    });

    app.use('/api/monitor', monitorRoutes);

    // Must come after all routes
    app.use(errorHandler);

    return app;
}
