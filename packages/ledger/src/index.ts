/**
 * @verigate/ledger - Credit metering with reserve / commit / release
 */

export {
  CreditLedger,
  type ReservationToken,
  type ReservationState,
  type SettleResult,
  type CreditLedgerOptions,
} from './ledger.js';

export { KeyedMutex } from './mutex.js';
