export {
  applyStopUpdate,
  closePositionRecord,
  validateOpenInput,
  type OpenPositionInput,
  type PositionLedger
} from './positionLedger.js';
export { MemoryPositionLedger, type MemoryLedgerOptions } from './memoryLedger.js';
export { PgPositionLedger, type PgLedgerOptions } from './pgLedger.js';
