/**
 * Transfer Config Schema
 *
 * @module config/schema/transfer
 */

/**
 * How a size meets a rate in transfer time. Transferred amounts are
 * always `bits / 8`.
 *
 * - `nominal`: a size is read at its labelled unit count on the decimal
 *   scale, so 1 GB moves as 10^9 bytes (1 GB at 100 Mbps takes 80 s).
 * * - `exact`: canonical bytes, 1 GB = 2^30 bytes (85.9 s at 100 Mbps).
 */
export type TransferConvention = 'nominal' | 'exact';

export const TRANSFER_CONVENTIONS: readonly TransferConvention[] = ['nominal', 'exact'];

export interface TransferConfigSchema {
  convention: TransferConvention;
}

export const DEFAULT_TRANSFER_CONFIG: TransferConfigSchema = {
  convention: 'nominal',
};
