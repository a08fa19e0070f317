/**
 * Command re-exports
 */

export { transferCommand, type TransferCommandOptions } from './transfer.js';
