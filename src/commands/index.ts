/**
 * Command exports
 */

export { createCommand, type CreateOptions, type ProvisionOptions } from './create.js';
export { updateCommand, type UpdateOptions } from './update.js';
export { repairCommand, type RepairOptions } from './repair.js';
export {
  provisionCommand,
  credentialPrompter,
  type ProvisionConfigOptions,
} from './provision.js';
export { interactiveCommand, type InteractiveOptions } from './interactive.js';
