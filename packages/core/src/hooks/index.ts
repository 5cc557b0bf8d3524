export { HookRegistry, type HookCallback, type HookRegistryOptions } from './registry.ts';
