/**
 * Monitor Routes
 *
 * Control surface for the weekly hours monitor. Every endpoint needs the
 * x-api-key header.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import {
    IsoDateSchema,
    MonitorRunRequestSchema,
    previousReportingWeek,
    resolvePeriods,
    weekContaining,
    type ReportingWeek,
} from '@hours-monitor/shared';
import { loadScheduleSettings } from '../config/monitor.js';
import { requireApiKey } from '../middleware/apiKey.js';
import { asyncHandler, typedRoute } from '../middleware/asyncHandler.js';
import { getMonitorState, runWeeklyMonitor } from '../services/hoursMonitor.js';
import scheduledMonitor from '../services/scheduledMonitor.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';

const router: Router = Router();

router.use(requireApiKey);

// ============================================
// GET /status: scheduler and run state
// ============================================

router.get('/status', (_req: Request, res: Response) => {
    const { isRunning, lastRunAt, lastError } = getMonitorState();
    res.json({ isRunning, lastRunAt, lastError, scheduler: scheduledMonitor.getStatus() });
});

// ============================================
// GET /last: result of the last successful run
// ============================================

router.get('/last', (_req: Request, res: Response) => {
    const { lastResult } = getMonitorState();
    if (!lastResult) {
        throw new NotFoundError('No monitoring run has completed yet', 'monitorRun');
    }
    res.json(lastResult);
});

// ============================================
// POST /run: run now (optionally for a given week, optionally preview)
// ============================================

router.post('/run', typedRoute(MonitorRunRequestSchema, async (body, _req, res) => {
    const result = await runWeeklyMonitor(body);
    res.json(result);
}));

// ============================================
// GET /week?date=YYYY-MM-DD: week and period split for a date
// ============================================

export function weekForQuery(date: unknown): ReportingWeek {
    if (date === undefined) {
        return previousReportingWeek(new Date(), loadScheduleSettings().timeZone);
    }
    const parsed = IsoDateSchema.safeParse(date);
    if (!parsed.success) {
        throw new ValidationError('date must be YYYY-MM-DD', { date });
    }
    return weekContaining(parsed.data);
}

router.get('/week', asyncHandler(async (req: Request, res: Response) => {
    const week = weekForQuery(req.query.date);
    res.json({
        week,
        periods: resolvePeriods(week).map((p) => ({ id: p.id, dates: p.dates })),
    });
}));

export default router;
