export { DiscoveryScanner, DeviceDiscoveredEvent, ScanErrorEvent } from "./scanner.ts";
export type { DiscoveryScannerInit } from "./scanner.ts";
