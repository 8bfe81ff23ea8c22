export { createInventoryEngine } from './inventory.service.core';
export { parseAvailability } from './inventory.service.query';
export type { InventoryEngine, SalePhase } from './inventory.service.types';
