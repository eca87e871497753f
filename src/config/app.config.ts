import 'dotenv/config';

export interface AppConfig {
  data: {
    shiftCalendarPath: string;
    inputEncoding: BufferEncoding;
  };
  output: {
    dir: string;
  };
  loadTimeTargetMinutes: number;
  api: {
    port: number;
  };
}

export function loadConfig(): AppConfig {
  const inputEncoding = process.env.INPUT_ENCODING || 'latin1';
  if (!Buffer.isEncoding(inputEncoding)) {
    throw new Error(`INPUT_ENCODING "${inputEncoding}" is not a supported encoding`);
  }

  const loadTimeTargetMinutes = parseFloat(process.env.LOAD_TIME_TARGET_MINUTES || '90');
  if (!Number.isFinite(loadTimeTargetMinutes) || loadTimeTargetMinutes <= 0) {
    throw new Error('LOAD_TIME_TARGET_MINUTES must be a positive number');
  }

  const port = parseInt(process.env.API_PORT || '3001', 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('API_PORT must be between 1 and 65535');
  }

  return {
    data: {
      shiftCalendarPath: process.env.SHIFT_CALENDAR_PATH || './data/shift-calendar.csv',
      inputEncoding
    },
    output: {
      dir: process.env.OUTPUT_DIR || './data/output'
    },
    loadTimeTargetMinutes,
    api: {
      port
    }
  };
}
