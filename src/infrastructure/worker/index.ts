export { runDeviceSync } from './device-sync.js';
