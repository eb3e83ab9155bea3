/**
 * @module transfer
 */

export {
  TransferCalculator,
  getDefaultTransferCalculator,
  nominalBytes,
  type TransferCalculatorOptions,
} from './calculator.js';
