export { InventoryInMemoryAdapter } from './inventory-in-memory.adapter';
