import dotenv from 'dotenv';

// Suppress dotenv logging
const originalLog = console.log;
console.log = (...args: unknown[]) => {
  if (args[0] && typeof args[0] === 'string' && args[0].includes('[dotenv]')) {
    return;
  }
  originalLog(...args);
};

dotenv.config({ path: './.env.test' });

// Restore original console.log
console.log = originalLog;

// Tests never write log files unless they opt in
process.env.CMS_FILE_LOGGING_ENABLED = 'false';
