export { InventoryController } from './inventory.controller';
