import 'reflect-metadata';
import { Express } from 'express';
import { Server } from 'http';
import { ActivityCleanerService } from '../services/activity-cleaner.service';
import { ComplianceMetricsService } from '../services/compliance-metrics.service';
import { CompliancePipelineService } from '../services/compliance-pipeline.service';
import { CsvProcessorService } from '../services/csv-processor.service';
import { IDashboardSession } from '../services/dashboard-session.interface';
import { DashboardSessionService } from '../services/dashboard-session.service';
import { LoadTimeMetricsService } from '../services/load-time-metrics.service';
import { OrderCleanerService } from '../services/order-cleaner.service';
import { ReconciliationService } from '../services/reconciliation.service';
import { ShiftResolverService } from '../services/shift-resolver.service';
import { TrailerCleanerService } from '../services/trailer-cleaner.service';
import { createApp } from './app';

const ACTIVITY_CSV = [
  'Create DateTime,Order #,Activity',
  '1/10/24 8:00,0212345,PICK',
  '1/10/24 8:10,0212345,LOAD'
].join('\n');

const ORDERS_CSV = [
  'Shipment #,SAP Delivery # (Order#),Appointment Date,Carrier,Appointment Type',
  'S100,0212345,1/10/24 8:00,ACME,LIVE',
  'S200,0400002,1/10/24 9:00,BOLT,DROP'
].join('\n');

const TRAILERS_CSV = [
  'ACTIVITY TYPE,SHIPMENT_ID,CHECKIN DATE TIME,CHECKOUT DATE TIME,Date/Time',
  'CLOSED,S100,1/10/24 8:05,1/10/24 9:30,1/10/24 9:00'
].join('\n');

async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = await new Promise<Server>(resolve => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server did not bind to a TCP port');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  const upload = (body: unknown) =>
    fetch(`${baseUrl}/api/uploads`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body)
    });

  const uploadSample = () => upload({ activity: ACTIVITY_CSV, orders: ORDERS_CSV, trailers: TRAILERS_CSV });

  beforeEach(async () => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    const shiftResolver = new ShiftResolverService(new Map([['2024-01-10', { '1': 'Red', '2': 'Blue' }]]));
    const pipeline = new CompliancePipelineService(
      new ActivityCleanerService(shiftResolver),
      new OrderCleanerService(),
      new TrailerCleanerService(shiftResolver),
      new ReconciliationService()
    );

    const app = createApp({
      session: new DashboardSessionService(pipeline),
      csvProcessor: new CsvProcessorService('latin1'),
      complianceMetrics: new ComplianceMetricsService(),
      loadTimeMetrics: new LoadTimeMetricsService(90)
    });

    ({ server, baseUrl } = await listen(app));
  });

  afterEach(async () => {
    await close(server);
    errorSpy.mockRestore();
    logSpy.mockRestore();
  });

  it('should report health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('should answer 404 until the first upload', async () => {
    const response = await fetch(`${baseUrl}/api/compliance`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ success: false, error: 'No files have been processed yet' });
  });

  describe('POST /api/uploads', () => {
    it('should clean and reconcile the three exports', async () => {
      // Act
      const response = await uploadSample();

      // Assert
      expect(response.status).toBe(200);
      expect(await response.json()).toEqual({
        success: true,
        message: 'All files uploaded and cleaned successfully',
        counts: { loadTimes: 1, orders: 2, trailers: 1, compliance: 1 }
      });
    });

    it('should reject a body missing a file', async () => {
      // Act
      const response = await upload({ activity: ACTIVITY_CSV, orders: ORDERS_CSV });

      // Assert
      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ success: false, error: 'trailers: Required' });
    });

    it('should reject a file with a schema error and keep the session empty', async () => {
      // Act
      const response = await upload({
        activity: ACTIVITY_CSV,
        orders: ORDERS_CSV,
        trailers: 'SHIPMENT_ID,CHECKIN DATE TIME,CHECKOUT DATE TIME,Date/Time\n'
      });

      // Assert
      expect(response.status).toBe(422);
      expect(await response.json()).toEqual({
        success: false,
        error: 'Error in processing files: The trailers file is missing required column(s): "ACTIVITY TYPE"'
      });
      expect((await fetch(`${baseUrl}/api/compliance`)).status).toBe(404);
    });
  });

  describe('after an upload', () => {
    beforeEach(async () => {
      await uploadSample();
    });

    it('should list compliance records', async () => {
      // Act
      const response = await fetch(`${baseUrl}/api/compliance`);

      // Assert
      expect(await response.json()).toMatchObject({
        success: true,
        records: [{
          shipmentNum: 'S100',
          compliance: 'On Time',
          dwellTimeHours: 1,
          shift: 'Red',
          checkinDateTime: new Date(2024, 0, 10, 8, 5).toISOString()
        }]
      });
    });

    it('should list load times', async () => {
      const response = await fetch(`${baseUrl}/api/load-times`);

      expect(await response.json()).toEqual({
        success: true,
        records: [{ orderNum: '0212345', loadTimeMinutes: 10, shift: 'Red', orderType: 'Shuttle' }]
      });
    });

    it('should break compliance down for a day', async () => {
      // Act
      const response = await fetch(`${baseUrl}/api/compliance/breakdown?period=day&value=01/10/2024`);

      // Assert
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        success: true,
        shiftOptions: ['All', 'Red'],
        breakdown: {
          shipmentCount: 1,
          totals: { onTime: 1, late: 0, grandTotal: 1, onTimePercent: 100 }
        }
      });
    });

    it('should reject a period without a value', async () => {
      const response = await fetch(`${baseUrl}/api/compliance/breakdown?period=day`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ success: false, error: 'value is required for period "day"' });
    });

    it('should reject a week out of range', async () => {
      const response = await fetch(`${baseUrl}/api/compliance/breakdown?period=week&value=60`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({
        success: false,
        error: 'week value must be an integer between 1 and 53'
      });
    });

    it('should accept the 53rd week of a long ISO year', async () => {
      // Act
      const response = await fetch(`${baseUrl}/api/compliance/breakdown?period=week&value=53`);

      // Assert
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ success: true, breakdown: { shipmentCount: 0 } });
    });

    it('should summarize load times for a shift', async () => {
      // Act
      const response = await fetch(`${baseUrl}/api/load-times/summary?shift=Red`);

      // Assert
      expect(await response.json()).toMatchObject({
        success: true,
        summary: {
          filter: { shift: 'Red', orderType: 'All' },
          targetMinutes: 90,
          orderCount: 1,
          complianceRate: 100
        },
        byShift: [{ shift: 'Red', compliant: 1, nonCompliant: 0, total: 1, complianceRate: 100 }]
      });
    });

    it('should export a table as a CSV attachment', async () => {
      // Act
      const response = await fetch(`${baseUrl}/api/export/load-times`);

      // Assert
      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toMatch(/^text\/csv/);
      expect(response.headers.get('content-disposition')).toBe('attachment; filename="load_times_data.csv"');
      expect(await response.text()).toBe('Order Num,Load Time (minutes),Shift,Order Type\n0212345,10,Red,Shuttle\n');
    });

    it('should answer 404 for an unknown export', async () => {
      const response = await fetch(`${baseUrl}/api/export/weather`);

      expect(response.status).toBe(404);
      expect(await response.json()).toEqual({ success: false, error: 'Unknown table "weather"' });
    });
  });
});

describe('HTTP API with an unavailable session', () => {
  let server: Server;
  let baseUrl: string;
  let mockSession: jest.Mocked<IDashboardSession>;

  beforeEach(async () => {
    mockSession = {
      upload: jest.fn(),
      current: jest.fn().mockReturnValue({ success: false, message: 'Session store unavailable' })
    };

    const app = createApp({
      session: mockSession,
      csvProcessor: new CsvProcessorService('latin1'),
      complianceMetrics: new ComplianceMetricsService(),
      loadTimeMetrics: new LoadTimeMetricsService(90)
    });
    ({ server, baseUrl } = await listen(app));
  });

  afterEach(async () => {
    await close(server);
  });

  it('should answer 500 when the session reports a failure', async () => {
    // Act
    const response = await fetch(`${baseUrl}/api/load-times`);

    // Assert
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ success: false, error: 'Session store unavailable' });
    expect(mockSession.current).toHaveBeenCalledTimes(1);
  });
});
