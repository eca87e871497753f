import { inject, injectable } from 'tsyringe';
import { z } from 'zod';
import { Result } from '../../types/result.types';
import { ShiftAssignment, ShiftCalendar } from '../../types/shift.types';
import { ICsvProcessor } from '../../services/csv-processor.interface';
import { normalizeHeader } from '../../utils/columns.util';
import { toDateKey, tryParseTimestamp } from '../../utils/timestamp.util';
import { IShiftCalendarAdapter } from './shift-calendar-adapter.interface';

// Zod schema for one calendar row after header normalization
const ShiftCalendarRowSchema = z.object({
  date: z.string().trim().min(1, 'Date cannot be empty'),
  slot1: z.string().trim().optional(),
  slot2: z.string().trim().optional()
});

type ShiftCalendarRow = z.infer<typeof ShiftCalendarRowSchema>;

@injectable()
export class CsvShiftCalendarAdapter implements IShiftCalendarAdapter {
  constructor(
    @inject('ShiftCalendarPath') private readonly calendarPath: string,
    @inject('ICsvProcessor') private readonly csvProcessor: ICsvProcessor
  ) {}

  async loadCalendar(): Promise<Result<ShiftCalendar>> {
    try {
      const table = await this.csvProcessor.readTable(this.calendarPath);
      const headers = new Map(table.columns.map(column => [normalizeHeader(column), column]));

      const dateColumn = headers.get('date');
      if (dateColumn === undefined) {
        return {
          success: false,
          message: `Failed to load shift calendar: column "Date" not found in ${this.calendarPath}`
        };
      }
      const slot1Column = headers.get('1');
      const slot2Column = headers.get('2');

      const calendar = new Map<string, ShiftAssignment>();
      const validationErrors: string[] = [];

      table.rows.forEach((row, index) => {
        try {
          const [dateKey, assignment] = this.mapToAssignment({
            date: row[dateColumn],
            slot1: slot1Column === undefined ? undefined : row[slot1Column],
            slot2: slot2Column === undefined ? undefined : row[slot2Column]
          });
          calendar.set(dateKey, assignment);
        } catch (error) {
          // Log but don't fail entire load - skip invalid row and continue
          const errorMsg = error instanceof Error ? error.message : String(error);
          validationErrors.push(`Row ${index + 1}: ${errorMsg}`);
          console.warn(`[Shift Calendar] Skipping invalid calendar row ${index + 1}: ${errorMsg}`);
        }
      });

      const message = validationErrors.length > 0
        ? `Shift calendar loaded with ${calendar.size} date(s), ${validationErrors.length} invalid row(s) skipped`
        : `Shift calendar loaded with ${calendar.size} date(s)`;

      return { success: true, data: calendar, message };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to load shift calendar: ${errorMessage}`
      };
    }
  }

  private mapToAssignment(raw: Record<keyof ShiftCalendarRow, unknown>): [string, ShiftAssignment] {
    const validationResult = ShiftCalendarRowSchema.safeParse(raw);

    if (!validationResult.success) {
      const errors = validationResult.error.issues.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
      throw new Error(`Shift calendar validation failed: ${errors}`);
    }

    const validated = validationResult.data;
    const date = tryParseTimestamp(validated.date);
    if (!date) {
      throw new Error(`Invalid calendar date "${validated.date}"`);
    }

    return [
      toDateKey(date),
      {
        '1': validated.slot1 || null,
        '2': validated.slot2 || null
      }
    ];
  }
}
