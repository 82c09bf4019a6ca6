/**
 * Device Flow Provider
 *
 * Auto-registers with ProviderRegistry on import.
 */

export { DeviceFlowProvider, DeviceCodeSchema } from './device-flow.provider.js';
export type { DeviceCode, DeviceFlowOptions } from './device-flow.provider.js';
