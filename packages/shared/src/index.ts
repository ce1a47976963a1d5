export { ConcurrentPool } from './utils/concurrent-pool';
export {
  VisionCaller,
  type VisionCallConfig,
  type VisionCallResult,
  type VisionCallUsage,
} from './utils/vision-caller';
