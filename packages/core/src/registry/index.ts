export { Registry, type RegistryRecord } from './registry.js';
export { generateId, nowIso } from './ids.js';
