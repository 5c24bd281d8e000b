export { InventoryServicePort } from './inventory.service.port';
