import dotenv from 'dotenv';

dotenv.config();

const Config = {
  LOG_WEBHOOK_URL: process.env.LOG_WEBHOOK_URL,
  ENABLE_WEBHOOK_LOGGING: process.env.ENABLE_WEBHOOK_LOGGING === 'true',
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  LOG_TO_FILE: process.env.NODE_ENV !== 'test' && process.env.LOG_TO_FILE !== 'false',
  LOG_SILENT: process.env.NODE_ENV === 'test' && process.env.LOG_LEVEL === undefined,
};

export default Config;
