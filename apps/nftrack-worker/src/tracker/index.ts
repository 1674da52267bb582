export { CoalescingTicker } from './coalescing-ticker.js';
export {
  TransferTracker,
  type BatchResult,
  type PollOutcome,
  type TrackerState,
  type TrackerStatus,
  type TransferTrackerOptions,
} from './transfer-tracker.js';
