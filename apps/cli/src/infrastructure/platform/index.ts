export { PlatformDetector } from './PlatformDetector';
export { NodeHostEnvironment } from './HostEnvironment';
export { PLATFORM_STRATEGIES, defaultDeviceName, strategyFor } from './strategies';
