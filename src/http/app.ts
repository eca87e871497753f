import express, { Express, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { IComplianceMetrics } from '../services/compliance-metrics.interface';
import { ICsvProcessor } from '../services/csv-processor.interface';
import { IDashboardSession } from '../services/dashboard-session.interface';
import { ILoadTimeMetrics } from '../services/load-time-metrics.interface';
import { PipelineOutput } from '../types/domain.types';
import { ALL_FILTER, PeriodFilter } from '../types/metrics.types';
import { isEmpty, isSuccess } from '../types/result.types';
import {
  COMPLIANCE_COLUMNS,
  LOAD_TIME_COLUMNS,
  ORDER_COLUMNS,
  TRAILER_COLUMNS
} from '../types/table.types';

export interface AppDependencies {
  session: IDashboardSession;
  csvProcessor: ICsvProcessor;
  complianceMetrics: IComplianceMetrics;
  loadTimeMetrics: ILoadTimeMetrics;
}

// Each export arrives as CSV text
const UploadRequestSchema = z.object({
  activity: z.string().min(1, 'activity CSV cannot be empty'),
  orders: z.string().min(1, 'orders CSV cannot be empty'),
  trailers: z.string().min(1, 'trailers CSV cannot be empty')
});

const BreakdownQuerySchema = z.object({
  period: z.enum(['day', 'week', 'month', 'ytd']).default('ytd'),
  value: z.string().optional(),
  shift: z.string().default(ALL_FILTER)
});

const LoadTimeQuerySchema = z.object({
  shift: z.string().default(ALL_FILTER),
  orderType: z.string().default(ALL_FILTER)
});

const EXPORTS = {
  'compliance': { fileName: 'merged_data.csv' },
  'load-times': { fileName: 'load_times_data.csv' },
  'orders': { fileName: 'order_data.csv' },
  'trailers': { fileName: 'trailer_data.csv' }
} as const;

type ExportName = keyof typeof EXPORTS;

function isExportName(name: string): name is ExportName {
  return Object.prototype.hasOwnProperty.call(EXPORTS, name);
}

function toPeriod(query: z.infer<typeof BreakdownQuerySchema>): PeriodFilter | string {
  if (query.period === 'ytd') {
    return { kind: 'ytd' };
  }
  if (!query.value) {
    return `value is required for period "${query.period}"`;
  }
  if (query.period === 'day') {
    return /^\d{2}\/\d{2}\/\d{4}$/.test(query.value)
      ? { kind: 'day', date: query.value }
      : 'day value must be formatted MM/dd/yyyy';
  }

  const number = Number(query.value);
  const max = query.period === 'week' ? 53 : 12;
  if (!Number.isInteger(number) || number < 1 || number > max) {
    return `${query.period} value must be an integer between 1 and ${max}`;
  }
  return query.period === 'week' ? { kind: 'week', week: number } : { kind: 'month', month: number };
}

function exportCsv(csvProcessor: ICsvProcessor, table: ExportName, output: PipelineOutput): Promise<string> {
  switch (table) {
    case 'compliance':
      return csvProcessor.stringifyTable(output.compliance, COMPLIANCE_COLUMNS);
    case 'load-times':
      return csvProcessor.stringifyTable(output.loadTimes, LOAD_TIME_COLUMNS);
    case 'orders':
      return csvProcessor.stringifyTable(output.orders, ORDER_COLUMNS);
    case 'trailers':
      return csvProcessor.stringifyTable(output.trailers, TRAILER_COLUMNS);
  }
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '50mb' }));

  // Responds 404 until the first successful upload
  const withSnapshot = (res: Response, handler: (output: PipelineOutput) => void): void => {
    const current = deps.session.current();
    if (isSuccess(current)) {
      handler(current.data);
      return;
    }
    res.status(isEmpty(current) ? 404 : 500).json({ success: false, error: current.message });
  };

  // POST /api/uploads - Replace the session tables with three fresh exports
  app.post('/api/uploads', async (req, res) => {
    const body = UploadRequestSchema.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({
        success: false,
        error: body.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ')
      });
      return;
    }

    try {
      // All three files are parsed before any cleaning starts
      const [activity, orders, trailers] = await Promise.all([
        deps.csvProcessor.parseTable(body.data.activity),
        deps.csvProcessor.parseTable(body.data.orders),
        deps.csvProcessor.parseTable(body.data.trailers)
      ]);

      const result = deps.session.upload({ activity, orders, trailers });
      if (!isSuccess(result)) {
        res.status(422).json({ success: false, error: result.message });
        return;
      }

      res.json({
        success: true,
        message: result.message,
        counts: {
          loadTimes: result.data.loadTimes.length,
          orders: result.data.orders.length,
          trailers: result.data.trailers.length,
          compliance: result.data.compliance.length
        }
      });
    } catch (error) {
      console.error('Upload error:', error);
      res.status(400).json({
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error occurred'
      });
    }
  });

  app.get('/api/compliance', (_req, res) => {
    withSnapshot(res, output => {
      res.json({ success: true, records: output.compliance });
    });
  });

  app.get('/api/load-times', (_req, res) => {
    withSnapshot(res, output => {
      res.json({ success: true, records: output.loadTimes });
    });
  });

  app.get('/api/compliance/breakdown', (req, res) => {
    const query = BreakdownQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ success: false, error: query.error.issues.map(e => e.message).join(', ') });
      return;
    }

    const period = toPeriod(query.data);
    if (typeof period === 'string') {
      res.status(400).json({ success: false, error: period });
      return;
    }

    withSnapshot(res, output => {
      res.json({
        success: true,
        shiftOptions: deps.complianceMetrics.shiftOptions(output.compliance),
        breakdown: deps.complianceMetrics.breakdown(output.compliance, { period, shift: query.data.shift })
      });
    });
  });

  app.get('/api/load-times/summary', (req, res) => {
    const query = LoadTimeQuerySchema.safeParse(req.query);
    if (!query.success) {
      res.status(400).json({ success: false, error: query.error.issues.map(e => e.message).join(', ') });
      return;
    }

    withSnapshot(res, output => {
      res.json({
        success: true,
        summary: deps.loadTimeMetrics.summarize(output.loadTimes, query.data),
        byShift: deps.loadTimeMetrics.complianceByShift(output.loadTimes)
      });
    });
  });

  app.get('/api/export/:table', (req, res) => {
    const table = req.params.table;
    if (!isExportName(table)) {
      res.status(404).json({ success: false, error: `Unknown table "${table}"` });
      return;
    }

    withSnapshot(res, output => {
      exportCsv(deps.csvProcessor, table, output)
        .then(content => {
          res.type('text/csv');
          res.attachment(EXPORTS[table].fileName);
          res.send(content);
        })
        .catch((error: unknown) => {
          console.error('Export error:', error);
          res.status(500).json({
            success: false,
            error: error instanceof Error ? error.message : 'Unknown error occurred'
          });
        });
    });
  });

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return app;
}
