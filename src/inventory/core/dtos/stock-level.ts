export interface InventoryItem {
  sku: string;
  name: string;
  quantity: number;
}

export interface StockLevel extends InventoryItem {
  /** quantity is below the configured low-stock threshold */
  lowStock: boolean;
}
