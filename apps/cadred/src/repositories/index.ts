export { PgMemoryStore } from './memory.js';
export { PgRunLedger } from './ledger.js';
export { PgScheduleStore } from './schedule.js';
