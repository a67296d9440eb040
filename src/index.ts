import config from './config/index.js';
import { createApp } from './app.js';
import { logger } from './middleware/requestLogger.js';
import { getTodayString } from './utils/date.js';
import { loadHolidayTable, toHolidaySet } from './utils/holidays.js';

// Start server
const start = (): void => {
  const holidayTable = loadHolidayTable(config.holidaysFile);
  logger.info({
    type: 'startup',
    holidaysFile: config.holidaysFile,
    years: [...holidayTable.keys()],
  });

  const app = createApp({
    holidayTable,
    holidays: toHolidaySet(holidayTable),
    today: getTodayString,
  });

  app.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
  });
};

try {
  start();
} catch (error) {
  logger.error({
    type: 'startup',
    message: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
}
