/**
 * Copy Trading Module
 *
 * Main Components:
 * - CopyTradingDriver: Poll-reconcile-execute control loop
 * - TargetObserver: Reads the target's trades from the activity feed
 * - Reconciler: Decides the local action for each target trade
 * - OrderExecutor: Places orders, handles partial fills and retries
 * - PositionLedger: The copier's own positions, built from confirmed fills
 */

export { CopyTradingDriver, type DriverConfig, type DriverDeps, type DriverStatus } from './CopyTradingDriver.js';
export {
  TargetObserver,
  activityToTradeEvent,
  compareCursor,
  cursorOf,
  type PollResult,
  type TargetObserverConfig,
} from './TargetObserver.js';
export { Reconciler, closeLegKey, type ReconcilerConfig } from './Reconciler.js';
export { OrderExecutor, type OrderExecutorConfig, type OrderExecutorDeps, type RecoverySummary } from './OrderExecutor.js';
export { PositionLedger } from './PositionLedger.js';

export * from './types.js';
