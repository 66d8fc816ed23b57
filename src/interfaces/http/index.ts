export { default as deviceRoutes } from './device-routes.js';
export type { DeviceRoutesOptions } from './device-routes.js';
