export { TransactionProcessor, buildTargetUrl, TRANSPORT_HEADERS } from './transaction-processor.js';
export type { ProcessOutcome, TransactionProcessorOptions } from './transaction-processor.js';
