// ──────────────────────────────────────────
// Reporting: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ReportService } from './report.service';
import { AppError, ValidationError, errorMessage } from '../../shared/errors';
import { EXPORT_FORMATS, PAYMENT_STATUSES, REPORT_KINDS } from '../../shared/types';

const exportQuerySchema = z.object({
  kind: z.enum(REPORT_KINDS).default('combined'),
  format: z.enum(EXPORT_FORMATS).default('workbook'),
});

const summaryQuerySchema = z.object({
  creator_id: z.string().min(1).optional(),
  payment_status: z.enum(PAYMENT_STATUSES).optional(),
});

export function createReportRoutes(reportService: ReportService): Router {
  const router = Router();

  // GET /export?kind=payments&format=flat_table — file download
  router.get('/export', async (req: Request, res: Response) => {
    try {
      const { kind, format } = parseQuery(exportQuerySchema, req.query);
      const report = await reportService.buildReport(kind, format);

      res.setHeader('Content-Type', report.contentType);
      res.setHeader('Content-Disposition', `attachment; filename="${report.filename}"`);
      res.setHeader('X-Skipped-Records', String(report.diagnostics.skipped));
      res.send(report.payload);
    } catch (err) {
      sendError(res, err);
    }
  });

  // GET /summary?creator_id=...&payment_status=pending — dashboard data
  router.get('/summary', async (req: Request, res: Response) => {
    try {
      const query = parseQuery(summaryQuerySchema, req.query);
      const overview = await reportService.getOverview({
        creatorId: query.creator_id,
        paymentStatus: query.payment_status,
      });
      res.json(overview);
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}

function parseQuery<T extends z.ZodTypeAny>(schema: T, query: unknown): z.infer<T> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new ValidationError('Invalid query parameters', { issues: result.error.flatten().fieldErrors });
  }
  return result.data;
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    console.warn(`[Reports] ${err.code}: ${err.message}`);
    res.status(err.status).json(err.toJSON());
    return;
  }
  console.error('[Reports] Unexpected error:', errorMessage(err));
  res.status(500).json({ error: 'Internal error' });
}

