/**
 * Execution module: thin facade over backends, backend selection and the basket executor.
 */
export {
  type ExecutionBackend,
  type PortfolioSource,
  type Submission,
  type Fills,
  extractOrderIds,
} from "./backend";
export { resolveBackend, initializeExecutionBackend, type BackendInit } from "./backend_selector";
export { ClobBackend, createClobTradingApi } from "./clob_backend";
export { SimmerBackend, SimmerSdkClient, estimateSimmerTotalAmount } from "./simmer_backend";
export {
  executeWithRetries,
  maybeExecuteCandidate,
  precheckBooks,
  realSleep,
  type ExecutionContext,
  type StateRef,
} from "./basket_executor";
