export { InventoryOutPort } from './inventory.out.port';
