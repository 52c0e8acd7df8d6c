export {
  getBulkWindowDays,
  getCbslLookbackDays,
  getDataDirectory,
  getDatabasePath,
  getTimeZone,
  resetEnvCache,
} from './config.js';
