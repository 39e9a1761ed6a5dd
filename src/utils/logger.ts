import { pino } from 'pino';

const logger = pino({
  name: 'notedrop',
  level: process.env.LOG_LEVEL || 'info',
});

export default logger;
