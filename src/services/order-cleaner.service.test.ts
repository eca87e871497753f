import 'reflect-metadata';
import { RawTable } from '../types/domain.types';
import { SchemaError } from '../types/result.types';
import { OrderCleanerService, requiredDateTimeFor } from './order-cleaner.service';

interface OrderRow {
  shipment: string;
  order: string;
  appointment: string;
  carrier: string;
  type: string;
}

function ordersTable(rows: OrderRow[]): RawTable {
  return {
    columns: ['Shipment #', 'SAP Delivery # (Order#)', 'Appointment Date', 'Carrier', 'Appointment Type', 'Status'],
    rows: rows.map(row => ({
      'Shipment #': row.shipment,
      'SAP Delivery # (Order#)': row.order,
      'Appointment Date': row.appointment,
      'Carrier': row.carrier,
      'Appointment Type': row.type,
      'Status': 'Scheduled'
    }))
  };
}

describe('OrderCleanerService', () => {
  let cleaner: OrderCleanerService;

  beforeEach(() => {
    cleaner = new OrderCleanerService();
  });

  describe('requiredDateTimeFor', () => {
    it('should allow 15 minutes after a LIVE appointment', () => {
      expect(requiredDateTimeFor(new Date(2024, 0, 10, 8, 0), 'LIVE')).toEqual(new Date(2024, 0, 10, 8, 15));
    });

    it('should allow 24 hours after any other visit type', () => {
      expect(requiredDateTimeFor(new Date(2024, 0, 10, 8, 0), 'DROP')).toEqual(new Date(2024, 0, 11, 8, 0));
      expect(requiredDateTimeFor(new Date(2024, 0, 10, 8, 0), 'live')).toEqual(new Date(2024, 0, 11, 8, 0));
    });
  });

  it('should build one order record per shipment with derived fields', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '3/15/24 8:00', carrier: 'ACME', type: 'LIVE' }
    ]);

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records).toEqual([
      {
        shipmentNum: 'S100',
        orderNum: '0212345',
        appointmentDateTime: new Date(2024, 2, 15, 8, 0),
        carrier: 'ACME',
        visitType: 'LIVE',
        requiredDateTime: new Date(2024, 2, 15, 8, 15),
        scheduledDate: '03/15/2024',
        week: 11,
        month: 3
      }
    ]);
  });

  it('should number weeks by ISO-8601 across the year boundary', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '12/31/24 10:00', carrier: 'ACME', type: 'DROP' }
    ]);

    // Act
    const [record] = cleaner.cleanOrders(raw);

    // Assert
    expect(record.week).toBe(1);
    expect(record.month).toBe(12);
    expect(record.scheduledDate).toBe('12/31/2024');
  });

  it('should keep the row with the latest appointment per shipment', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 10:00', carrier: 'BOLT', type: 'DROP' },
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 9:00', carrier: 'CRUX', type: 'LIVE' }
    ]);

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records).toHaveLength(1);
    expect(records[0].appointmentDateTime).toEqual(new Date(2024, 0, 10, 10, 0));
    expect(records[0].carrier).toBe('BOLT');
    expect(records[0].requiredDateTime).toEqual(new Date(2024, 0, 11, 10, 0));
  });

  it('should keep the earlier row when appointments are equal', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S100', order: '0212399', appointment: '1/10/24 8:00', carrier: 'BOLT', type: 'LIVE' }
    ]);

    // Act
    const [record] = cleaner.cleanOrders(raw);

    // Assert
    expect(record.orderNum).toBe('0212345');
  });

  it('should prefer a dated row over an undated one', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 8:00', carrier: 'BOLT', type: 'LIVE' }
    ]);

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records.map(r => r.carrier)).toEqual(['BOLT']);
  });

  it('should drop a shipment whose latest row is incomplete rather than fall back to an older row', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S100', order: '0212345', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S100', order: '0212345', appointment: '1/11/24 8:00', carrier: '', type: 'LIVE' },
      { shipment: 'S200', order: '0412345', appointment: '1/11/24 9:00', carrier: 'ACME', type: 'DROP' }
    ]);

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records.map(r => r.shipmentNum)).toEqual(['S200']);
  });

  it('should skip rows without a shipment number', () => {
    const raw = ordersTable([
      { shipment: '', order: '0212345', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' }
    ]);

    expect(cleaner.cleanOrders(raw)).toEqual([]);
  });

  it('should sort records by shipment number', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: 'S300', order: '1', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S100', order: '2', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' },
      { shipment: 'S200', order: '3', appointment: '1/10/24 8:00', carrier: 'ACME', type: 'LIVE' }
    ]);

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records.map(r => r.shipmentNum)).toEqual(['S100', 'S200', 'S300']);
  });

  it('should accept already-canonical headers', () => {
    // Arrange
    const raw: RawTable = {
      columns: ['Shipment Num', 'Order Num', 'Appointment DateTime', 'Carrier', 'Visit Type'],
      rows: [{
        'Shipment Num': 'S100',
        'Order Num': '0212345',
        'Appointment DateTime': '2024-01-10 08:00:00',
        'Carrier': 'ACME',
        'Visit Type': 'LIVE'
      }]
    };

    // Act
    const records = cleaner.cleanOrders(raw);

    // Assert
    expect(records[0].requiredDateTime).toEqual(new Date(2024, 0, 10, 8, 15));
  });

  it('should reject an unparseable appointment even on a row that would be skipped', () => {
    // Arrange
    const raw = ordersTable([
      { shipment: '', order: '0212345', appointment: 'TBD', carrier: 'ACME', type: 'LIVE' }
    ]);

    // Act & Assert
    expect(() => cleaner.cleanOrders(raw)).toThrow(SchemaError);
    expect(() => cleaner.cleanOrders(raw)).toThrow(
      'Unparseable timestamp "TBD" in column "Appointment Date" of the orders file (row 1)'
    );
  });

  it('should reject a file missing required columns', () => {
    const raw: RawTable = { columns: ['Shipment #', 'Carrier'], rows: [] };

    expect(() => cleaner.cleanOrders(raw)).toThrow(
      'The orders file is missing required column(s): "SAP Delivery # (Order#)", "Appointment Date", "Appointment Type"'
    );
  });
});
