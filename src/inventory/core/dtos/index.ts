export { InventoryItem, StockLevel } from './stock-level';
