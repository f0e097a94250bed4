export { Monitor } from './monitor.js';
export type { MonitorOptions } from './monitor.js';
export { scanOnce, taskLogsContain } from './scanner.js';
export type { ScanResult } from './scanner.js';
